/**
 * @fileoverview Prompt assembly for page generation and updates.
 *
 * The base prompt is filled in first; optional context blocks are appended
 * after it in a fixed order, each separated by a blank line.
 */

import {
  GENERATION_PROMPT,
  TEMPLATE_CONTEXT_PROMPT,
  TEMPLATE_PROMPT_LIMIT,
  UPDATE_PROMPT,
} from './templates.js';

export interface GenerationPromptParts {
  brief: string;
  templateContext?: string;
  referenceContext?: string;
  profileContext?: string;
  styleContext?: string;
  interactiveContext?: string;
  componentBlueprint?: string;
}

export interface UpdatePromptParts {
  currentHtml: string;
  changeRequest: string;
  styleContext?: string;
  componentBlueprint?: string;
}

/** Where the profile image came from. */
export type ProfileSource =
  | { kind: 'upload' }
  | { kind: 'url'; url: string };

/**
 * Replace markers with split/join so `$` sequences in user text stay literal.
 */
function fill(template: string, values: Record<string, string>): string {
  let result = template;
  for (const [marker, value] of Object.entries(values)) {
    result = result.split(marker).join(value);
  }
  return result;
}

function appendBlocks(base: string, blocks: Array<string | undefined>): string {
  let prompt = base;
  for (const block of blocks) {
    const trimmed = block?.trim();
    if (trimmed) {
      prompt += `\n\n${trimmed}`;
    }
  }
  return prompt;
}

/**
 * TEMPLATE TO MODIFY block for a site template, or '' when there is none.
 */
export function buildTemplateContext(templateHtml: string | null | undefined): string {
  if (!templateHtml) {
    return '';
  }
  return fill(TEMPLATE_CONTEXT_PROMPT, {
    __TEMPLATE_HTML__: templateHtml.slice(0, TEMPLATE_PROMPT_LIMIT),
  });
}

/**
 * Full generation prompt. Appended after the base, when present: reference,
 * profile, style, interactive and component blocks, in that order.
 */
export function buildGenerationPrompt(parts: GenerationPromptParts): string {
  const base = fill(GENERATION_PROMPT, {
    __BRIEF__: parts.brief,
    __TEMPLATE_CONTEXT__: parts.templateContext ?? '',
  }).trim();

  return appendBlocks(base, [
    parts.referenceContext,
    parts.profileContext,
    parts.styleContext,
    parts.interactiveContext,
    parts.componentBlueprint,
  ]);
}

/**
 * Minimal-change update prompt, followed by style and component blocks.
 */
export function buildUpdatePrompt(parts: UpdatePromptParts): string {
  const base = fill(UPDATE_PROMPT, {
    __CURRENT_HTML__: parts.currentHtml,
    __CHANGE_REQUEST__: parts.changeRequest,
  });
  return appendBlocks(base, [parts.styleContext, parts.componentBlueprint]);
}

export function buildProfileContext(source: ProfileSource): string {
  if (source.kind === 'upload') {
    return 'PROFILE IMAGE: User has uploaded a profile picture. Use {{image: profile}} placeholder to include it in the design.';
  }
  return `PROFILE IMAGE: User provided profile image URL: ${source.url}. Use {{image: profile}} placeholder to include it in the design.`;
}
