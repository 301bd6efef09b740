import { describe, expect, it } from 'vitest';
import { repairHtml } from '../../src/services/html/repair.js';

describe('repairHtml', () => {
  it('strips markdown fences', () => {
    expect(repairHtml('```html\n<html><body>x</body></html>\n```')).toBe('<html><body>x</body></html>');
    expect(repairHtml('```\n<p>x</p>\n```  ')).toBe('<p>x</p>');
  });

  it('returns blank input unchanged', () => {
    expect(repairHtml('   ')).toBe('   ');
  });

  it('collapses repeated containers', () => {
    expect(repairHtml('<div class="container mx-auto"><div class="container mx-auto"><p>x</p></div>')).toBe(
      '<div class="container mx-auto"><p>x</p></div>'
    );
  });

  it('caps runs of closing divs', () => {
    expect(repairHtml('<p>a</p></div></div></div></div></div>')).toBe('<p>a</p></div></div></div>');
  });

  it('wraps loose skill tags', () => {
    const tag = (text: string) => `<span class="px-4 py-2 bg-gray-100 rounded">${text}</span>`;

    expect(repairHtml(`<section>${tag('TS')} ${tag('Go')}</section>`)).toBe(
      `<section><div class='flex flex-wrap gap-3 mt-8'>${tag('TS')} ${tag('Go')}</div></section>`
    );
  });

  it('puts a lone featured project card into a grid', () => {
    const html = '<section><h2>Featured Projects</h2><div class="card-hover p-4">A</div></section>';

    expect(repairHtml(html)).toBe(
      "<section><h2>Featured Projects</h2><div class='grid md:grid-cols-2 lg:grid-cols-3 gap-8'>" +
        '<div class="card-hover p-4">A</div></div></section>'
    );
  });

  it('wraps loose skill bars in a centred column', () => {
    const bars =
      '<div class="space-y-4"><div class="flex justify-between"><span>TS</span></div>' +
      '<div class="bg-gray-200 h-2"></div></div>';

    expect(repairHtml(`<section><h2>Skills</h2>${bars}</section>`)).toBe(
      `<section><h2>Skills</h2><div class='max-w-4xl mx-auto space-y-8'>${bars}</div></section>`
    );
  });

  it('leaves well-formed pages alone', () => {
    const html = '<!DOCTYPE html><html><body><main><p>Hello</p></main></body></html>';

    expect(repairHtml(html)).toBe(html);
  });
});
