import { readFileSync } from 'node:fs';
import { join } from 'node:path';

const cache = new Map<string, string>();

function promptsDir(): string {
  return process.env.MCQ_PROMPTS_DIR || join(process.cwd(), 'prompts');
}

export function loadPrompt(name: string): string {
  const cached = cache.get(name);
  if (cached !== undefined) {
    return cached;
  }
  const text = readFileSync(join(promptsDir(), name), 'utf-8').trim();
  cache.set(name, text);
  return text;
}

export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/{{(\w+)}}/g, (_match, key: string) => values[key] ?? '');
}
