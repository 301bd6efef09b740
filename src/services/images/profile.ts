/**
 * Personal-site briefs with an uploaded headshot must actually show it.
 */

import type { UploadedImages } from './types.js';

const PERSONAL_SITE_KEYWORDS = [
  'portfolio',
  'resume',
  'cv',
  'curriculum vitae',
  'about me',
  'personal website',
  'my profile',
  'professional profile',
  'my resume',
  'create resume',
];

const UNSPLASH_IMG_TAG = /<img[^>]*src="https:\/\/images\.unsplash\.com\/[^"]*"[^>]*>/g;

export function isPersonalSiteBrief(prompt: string): boolean {
  const lower = prompt.toLowerCase();
  return PERSONAL_SITE_KEYWORDS.some((keyword) => lower.includes(keyword));
}

/**
 * When a portfolio/resume page came back without a profile placeholder,
 * swap its stock Unsplash photos for `{{image: profile}}`.
 */
export function ensureProfilePlaceholder(html: string, prompt: string, uploadedImages: UploadedImages): string {
  if (!isPersonalSiteBrief(prompt) || !Object.hasOwn(uploadedImages, 'profile')) {
    return html;
  }
  if (html.includes('{{image: profile}}') || html.includes('{{image:profile}}')) {
    return html;
  }
  return html.replace(UNSPLASH_IMG_TAG, '<img src="{{image: profile}}" alt="profile">');
}
