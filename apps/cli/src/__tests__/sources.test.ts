import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { expandSources, parseUrlList } from '../lib/sources.js';

describe('parseUrlList', () => {
  it('drops blank lines and comments', () => {
    expect(parseUrlList('# mine\nhttps://a.test/album/1\r\n\n  https://b.test/track/2  \n')).toEqual([
      'https://a.test/album/1',
      'https://b.test/track/2',
    ]);
  });
});

describe('expandSources', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'hiresdl-sources-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('expands nested lists in order and stops at cycles', async () => {
    await writeFile(join(dir, 'list.txt'), '# queue\nhttps://a.test/album/1\nnested.txt\nhttps://b.test/track/2\n');
    await writeFile(join(dir, 'nested.txt'), 'https://c.test/label/3\nlist.txt\n');

    const urls = await expandSources(['https://x.test/playlist/9', 'list.txt', 'missing.txt'], dir);

    expect(urls).toEqual([
      'https://x.test/playlist/9',
      'https://a.test/album/1',
      'https://c.test/label/3',
      'https://b.test/track/2',
      'missing.txt',
    ]);
  });
});
