#!/usr/bin/env npx tsx
/**
 * Local page generation CLI.
 *
 * Sends a brief (or a change request) to the running server and prints where
 * the page was written.
 *
 * Usage:
 *   npm run page "Landing page for a neighbourhood bakery"
 *   npm run page -- --style editorial --template portfolio "Portfolio for a photographer"
 *   npm run page -- --session <id> --update "Make the hero darker"
 */

const BASE_URL = process.env.BASE_URL || 'http://localhost:3000';

interface Options {
  style: string;
  template: string;
  session: string;
  update: boolean;
  text: string;
}

function parseArgs(args: string[]): Options {
  const options: Options = {
    style: '',
    template: '',
    session: '',
    update: false,
    text: '',
  };

  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--style' || arg === '-s') {
      options.style = args[++i] || options.style;
    } else if (arg === '--template' || arg === '-t') {
      options.template = args[++i] || options.template;
    } else if (arg === '--session') {
      options.session = args[++i] || options.session;
    } else if (arg === '--update' || arg === '-u') {
      options.update = true;
    } else if (arg === '--help' || arg === '-h') {
      printHelp();
      process.exit(0);
    } else if (!arg.startsWith('-')) {
      positional.push(arg);
    }
  }

  options.text = positional.join(' ');

  return options;
}

function printHelp(): void {
  console.log(`
Local Page Generation CLI

Usage:
  npm run page "your brief here"
  npm run page -- --style brutalist "brief"
  npm run page -- --session <id> --update "change request"

Options:
  --style, -s       Style preset key (brutalist, editorial, neomorphism, artisan)
  --template, -t    Starter template name (see GET /api/catalog)
  --session         Session id to continue
  --update, -u      Treat the text as a change request for --session
  --help, -h        Show this help message
`);
}

function requestFor(options: Options): { path: string; body: Record<string, string> } {
  if (options.update) {
    return {
      path: '/update',
      body: { session_id: options.session, update_prompt: options.text },
    };
  }
  const body: Record<string, string> = { prompt: options.text };
  if (options.style) body.style_preset = options.style;
  if (options.template) body.selected_template = options.template;
  return { path: '/generate', body };
}

async function main(options: Options): Promise<void> {
  if (!options.text) {
    console.error('Error: No brief provided');
    console.error('Usage: npm run page "your brief"');
    process.exit(1);
  }
  if (options.update && !options.session) {
    console.error('Error: --update needs --session <id>');
    process.exit(1);
  }

  const { path, body } = requestFor(options);
  console.log(`Sending to: ${BASE_URL}${path}`);

  try {
    const response = await fetch(`${BASE_URL}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });

    const payload: unknown = await response.json();
    console.log(`Response Status: ${response.status}`);

    if (typeof payload === 'object' && payload !== null && 'session_id' in payload && 'file_path' in payload) {
      console.log(`Provider: ${'provider' in payload ? String(payload.provider) : 'unknown'}`);
      console.log(`Session: ${String(payload.session_id)}`);
      console.log(`Page: ${String(payload.file_path)}`);
      console.log(`Preview: ${BASE_URL}/preview/${String(payload.session_id)}`);
    } else {
      console.log(`Response Body: ${JSON.stringify(payload)}`);
    }
    if (!response.ok) {
      process.exit(1);
    }
  } catch (error) {
    if (error instanceof Error && error.message.includes('ECONNREFUSED')) {
      console.error('Error: Could not connect to server');
      console.error('Make sure the server is running: npm run dev');
    } else {
      console.error('Error:', error instanceof Error ? error.message : error);
    }
    process.exit(1);
  }
}

// Parse arguments (skip node and script path)
const options = parseArgs(process.argv.slice(2));

main(options).catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
