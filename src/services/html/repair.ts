/**
 * @fileoverview Post-generation cleanup of model HTML.
 *
 * Strips markdown fences and patches the layout slips models make most
 * often in portfolio-style pages: grid items without a grid, skill bars and
 * skill tags without a wrapper, repeated containers and runs of stray
 * closing tags.
 */

const LEADING_FENCE = /^\s*```(?:html)?\s*/i;
const TRAILING_FENCE = /\s*```\s*$/;

const FEATURED_PROJECTS_CARD =
  /(<section[^>]*>[\s\S]*?<h2[^>]*>Featured Projects<\/h2>[\s\S]*?)(<div class="card-hover[^>]*>[\s\S]*?<\/div>)([\s\S]*?<\/section>)/g;
const ORPHANED_SKILL_BARS =
  /(<section[^>]*>[\s\S]*?<h2[^>]*>Skills[^<]*<\/h2>[\s\S]*?)(<div class="space-y-4">\s*<div class="flex justify-between[^>]*>[\s\S]*?<\/div>\s*<div class="bg-gray-200[^>]*>[\s\S]*?<\/div>\s*<\/div>)([\s\S]*?<\/section>)/g;
const ORPHANED_SKILL_TAGS = /(\s*<span class="px-4 py-2 bg-gray-100[^>]*>[^<]*<\/span>\s*)+/g;
const DUPLICATE_CONTAINERS = /(<div class=['"]container[^>]*>)(\s*\1)+/g;
const STRAY_CLOSING_DIVS = /(<\/div>){4,}/g;

function wrapMiddle(className: string) {
  return (_match: string, before: string, inner: string, after: string): string =>
    `${before}<div class='${className}'>${inner}</div>${after}`;
}

/**
 * Repair common structural defects in generated HTML.
 * Empty input is returned unchanged.
 */
export function repairHtml(html: string): string {
  if (!html.trim()) {
    return html;
  }

  let result = html.trim();
  result = result.replace(LEADING_FENCE, '').replace(TRAILING_FENCE, '').trim();

  result = result.replace(FEATURED_PROJECTS_CARD, wrapMiddle('grid md:grid-cols-2 lg:grid-cols-3 gap-8'));
  result = result.replace(ORPHANED_SKILL_BARS, wrapMiddle('max-w-4xl mx-auto space-y-8'));
  result = result.replace(ORPHANED_SKILL_TAGS, (run) => `<div class='flex flex-wrap gap-3 mt-8'>${run}</div>`);
  result = result.replace(DUPLICATE_CONTAINERS, (_match: string, container: string) => container);
  result = result.replace(STRAY_CLOSING_DIVS, '</div></div></div>');

  return result.trim();
}
