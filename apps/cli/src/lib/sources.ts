/**
 * Input sources
 *
 * Each argument is a URL or a text file listing URLs, one per line.
 * Blank lines and `#` comments are ignored; listed files expand in place.
 */

import { dirname, resolve } from 'node:path';
import { isFile, safeReadFile } from '@hiresdl/utils';

const URL_PATTERN = /^https?:\/\//i;

export function parseUrlList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

async function expand(source: string, baseDir: string, seen: Set<string>, out: string[]): Promise<void> {
  if (URL_PATTERN.test(source)) {
    out.push(source);
    return;
  }

  const path = resolve(baseDir, source);
  if (!(await isFile(path))) {
    // left for the resolver to report as an invalid URL
    out.push(source);
    return;
  }
  if (seen.has(path)) {
    return;
  }
  seen.add(path);

  const content = (await safeReadFile(path)) ?? '';
  for (const entry of parseUrlList(content)) {
    await expand(entry, dirname(path), seen, out);
  }
}

export async function expandSources(sources: readonly string[], cwd = process.cwd()): Promise<string[]> {
  const urls: string[] = [];
  const seen = new Set<string>();
  for (const source of sources) {
    await expand(source, cwd, seen, urls);
  }
  return urls;
}
