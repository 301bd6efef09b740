/**
 * Generation service request/result types.
 */

import type { EnhancementSelection } from '../catalog/interactive.js';
import type { ComponentSelection, SectionPreferences } from '../catalog/types.js';
import type { ProviderName } from '../llm/types.js';
import type { ReferenceFile } from '../reference/files.js';

export interface GenerateWebsiteRequest {
  prompt: string;
  selectedTemplate?: string;
  referenceUrl?: string;
  referenceFiles?: ReferenceFile[];
  stylePreset?: string;
  preferredSections?: SectionPreferences;
  interactiveEnhancements?: EnhancementSelection[];
  /** Uploaded profile picture as a data URL */
  profileImage?: string;
  /** Profile picture by http(s) URL, used when no upload was given */
  profileImageUrl?: string;
}

export interface UpdateWebsiteRequest {
  changeRequest: string;
  /** HTML to edit; defaults to the session's current HTML */
  currentHtml?: string;
  originalPrompt?: string;
  /** Profile picture (data URL or URL) */
  profileImage?: string;
  stylePreset?: string;
  preferredSections?: SectionPreferences;
  sessionId?: string;
}

export interface WebsiteResult {
  sessionId: string;
  filePath: string;
  content: string;
  componentBlueprint: string;
  componentVariants: Record<string, ComponentSelection>;
  preferredSections: SectionPreferences;
  provider: ProviderName;
}
