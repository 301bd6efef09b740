import { describe, expect, it } from 'vitest';
import { redactSecrets, safeSnippet } from '../../../src/utils/observability/index.js';

describe('observability redaction', () => {
  it('redacts sensitive keys and page content', () => {
    const input = {
      apiKey: 'test-secret',
      prompt: 'Portfolio for a ceramic artist',
      html: '<html></html>',
      nested: {
        client_secret: 'test-secret',
        provider: 'openai',
      },
    };

    const redacted = redactSecrets(input);

    expect(redacted).toEqual({
      apiKey: '[REDACTED]',
      prompt: `[REDACTED_TEXT len=${input.prompt.length}]`,
      html: '[REDACTED_TEXT len=13]',
      nested: { client_secret: '[REDACTED]', provider: 'openai' },
    });
  });

  it('masks data URLs and bearer credentials in free text', () => {
    expect(redactSecrets('image data:image/png;base64,AQID sent')).toBe(
      'image [DATA_URL image/png len=26] sent'
    );
    expect(redactSecrets('header Bearer test-secret rejected')).toBe('header Bearer [REDACTED] rejected');
    expect(redactSecrets('Client-ID test-secret')).toBe('Client-ID [REDACTED]');
  });

  it('summarizes errors without their stack outside development', () => {
    const redacted = redactSecrets({ error: new Error('upstream said Bearer test-secret') });

    expect(redacted.error).toEqual({
      name: 'Error',
      message: 'upstream said Bearer [REDACTED]',
      stack: undefined,
    });
  });

  it('truncates long snippets safely', () => {
    const value = 'x'.repeat(200);
    const snippet = safeSnippet(value, 20);
    expect(snippet).toBe('xxxxxxxxxxxxxxxxxxxx...(truncated)');
  });
});
