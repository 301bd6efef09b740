/**
 * Response shapes. The HTTP API uses snake_case field names throughout.
 */

import type {
  Catalog,
  ComponentSelection,
  ComponentVariant,
} from '../services/catalog/index.js';
import type { WebsiteResult } from '../services/generation/index.js';
import type { Session, SessionRevision } from '../services/sessions/index.js';

function serializeVariant(variant: ComponentVariant) {
  return {
    id: variant.id,
    name: variant.name,
    layout: variant.layout,
    content_focus: variant.contentFocus,
    visual_notes: variant.visualNotes,
    best_for: variant.bestFor,
    css_primitives: variant.cssPrimitives,
  };
}

function serializeSelection(selection: ComponentSelection) {
  return {
    section_label: selection.sectionLabel,
    section_description: selection.sectionDescription,
    variant: serializeVariant(selection.variant),
  };
}

export function serializeWebsiteResult(result: WebsiteResult) {
  return {
    success: true,
    session_id: result.sessionId,
    file_path: result.filePath,
    content: result.content,
    component_blueprint: result.componentBlueprint,
    component_variants: Object.fromEntries(
      Object.entries(result.componentVariants).map(([section, selection]) => [
        section,
        serializeSelection(selection),
      ])
    ),
    preferred_sections: result.preferredSections,
    provider: result.provider,
  };
}

export function serializeCatalog(catalog: Catalog, templates: string[]) {
  return {
    style_presets: Object.fromEntries(
      Object.entries(catalog.stylePresets).map(([key, preset]) => [
        key,
        {
          label: preset.label,
          palette: preset.palette,
          fonts: preset.fonts,
          mood: preset.mood,
          ui_accents: preset.uiAccents,
          instructions: preset.instructions,
          image_prompt: preset.imagePrompt,
        },
      ])
    ),
    component_library: Object.fromEntries(
      Object.entries(catalog.componentLibrary).map(([key, section]) => [
        key,
        {
          label: section.label,
          description: section.description,
          variants: section.variants.map(serializeVariant),
        },
      ])
    ),
    interactive_enhancements: catalog.interactiveEnhancements,
    templates,
  };
}

/**
 * Session metadata plus a revision summary. Revision HTML is left out;
 * the profile image is reported by presence only.
 */
export function serializeSession(session: Session, revisions: SessionRevision[]) {
  return {
    session_id: session.id,
    original_prompt: session.originalPrompt,
    style_preset: session.stylePreset ?? null,
    preferred_sections: session.preferredSections ?? {},
    has_profile_image: Boolean(session.profileImage),
    provider: session.provider,
    current_html: session.currentHtml,
    created_at: new Date(session.createdAt).toISOString(),
    updated_at: new Date(session.updatedAt).toISOString(),
    revisions: revisions.map((revision) => ({
      revision_id: revision.id,
      kind: revision.kind,
      prompt: revision.prompt,
      provider: revision.provider,
      html_length: revision.html.length,
      created_at: new Date(revision.createdAt).toISOString(),
    })),
  };
}
