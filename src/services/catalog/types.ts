/**
 * Design catalog types.
 *
 * The JSON files use snake_case keys (`ui_accents`, `best_for`); the loader
 * maps them onto these camelCase shapes.
 */

export interface StylePreset {
  label: string;
  palette: string[];
  fonts: string[];
  mood: string[];
  uiAccents: string;
  instructions: string;
  /** Appended to image-generation prompts so imagery matches the style */
  imagePrompt: string;
}

export interface ComponentVariant {
  id: string;
  name: string;
  layout: string;
  contentFocus: string[];
  visualNotes: string;
  /** Project tags this variant suits (saas, portfolio, ...) */
  bestFor: string[];
  cssPrimitives: string[];
}

export interface ComponentSection {
  label: string;
  description: string;
  variants: ComponentVariant[];
}

export interface InteractiveEnhancement {
  label: string;
  purpose: string;
  placement: string;
  implementation: string;
}

/** Per-section override sent by the client. */
export interface SectionPreference {
  include?: boolean;
  variant?: string;
}

export type SectionPreferences = Record<string, SectionPreference>;

/** A section and the variant chosen for it. */
export interface ComponentSelection {
  sectionLabel: string;
  sectionDescription: string;
  variant: ComponentVariant;
}

export type StylePresetLibrary = Record<string, StylePreset>;
export type ComponentLibrary = Record<string, ComponentSection>;
export type EnhancementLibrary = Record<string, InteractiveEnhancement>;

export interface Catalog {
  stylePresets: StylePresetLibrary;
  componentLibrary: ComponentLibrary;
  interactiveEnhancements: EnhancementLibrary;
}
