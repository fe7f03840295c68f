import { access, mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { KnownLinkSet } from '../types.js';
import type { Logger } from '../utils/logger.js';
import { parseKnownLinks } from './reader.js';
import type { FeedParseError } from './reader.js';

export interface FeedStore {
  exists(path: string): Promise<boolean>;
  readKnownLinks(path: string): Promise<KnownLinkSet>;
  writeFeed(path: string, document: string): Promise<void>;
}

export class FileFeedStore implements FeedStore {
  constructor(private readonly logger?: Logger) {}

  async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  }

  async readKnownLinks(path: string): Promise<KnownLinkSet> {
    let xml: string;
    try {
      xml = await readFile(path, 'utf8');
    } catch {
      return new Set();
    }

    const problems: FeedParseError[] = [];
    const links = parseKnownLinks(xml, (error) => problems.push(error));
    if (problems.length > 0) {
      await this.logger?.warn(`Could not read previous feed ${path}: ${String(problems[0])}`);
    }
    return links;
  }

  async writeFeed(path: string, document: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    const tempPath = `${path}.tmp`;
    await writeFile(tempPath, document, 'utf8');
    await rename(tempPath, path);
  }
}
