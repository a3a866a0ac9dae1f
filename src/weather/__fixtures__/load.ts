import { readFileSync } from 'node:fs';

/**
 * Read a JSON fixture from this directory as a fresh object
 */
export function loadFixture(name: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(readFileSync(new URL(`./${name}`, import.meta.url), 'utf8'));
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Fixture ${name} is not a JSON object`);
  }
  return { ...parsed };
}
