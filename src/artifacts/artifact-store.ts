/**
 * Append-only store for generated artifacts.
 *
 * Every category lives in its own directory under the output root. Writers
 * never overwrite: when a name is already taken (two runs in the same second,
 * a second daily report on the same day) the file gets a numeric suffix.
 * Concurrent pipelines may write to the same category; nothing is
 * deduplicated.
 */
import * as fs from 'node:fs/promises';
import * as path from 'node:path';

export const ARTIFACT_CATEGORIES = ['posts', 'articles', 'emails', 'reports', 'analytics'] as const;

export type ArtifactCategory = (typeof ARTIFACT_CATEGORIES)[number];

export interface Artifact {
  category: ArtifactCategory;
  /** Absolute path of the written file */
  path: string;
  createdAt: Date;
}

export type Clock = () => Date;

const MAX_NAME_ATTEMPTS = 1000;

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class ArtifactStore {
  readonly rootDir: string;
  private readonly clock: Clock;

  constructor(rootDir: string, clock: Clock = () => new Date()) {
    this.rootDir = path.resolve(rootDir);
    this.clock = clock;
  }

  now(): Date {
    return this.clock();
  }

  dir(category: ArtifactCategory): string {
    return path.join(this.rootDir, category);
  }

  /**
   * Create every category directory.
   */
  async ensureLayout(): Promise<void> {
    await Promise.all(ARTIFACT_CATEGORIES.map((category) => fs.mkdir(this.dir(category), { recursive: true })));
  }

  /**
   * Write a new artifact named `<baseName><extension>`, or
   * `<baseName>-<n><extension>` when that name is taken.
   */
  async write(
    category: ArtifactCategory,
    baseName: string,
    extension: string,
    content: string,
    createdAt: Date = this.now()
  ): Promise<Artifact> {
    const dir = this.dir(category);
    await fs.mkdir(dir, { recursive: true });

    for (let attempt = 1; attempt <= MAX_NAME_ATTEMPTS; attempt++) {
      const name = attempt === 1 ? `${baseName}${extension}` : `${baseName}-${attempt}${extension}`;
      const filePath = path.join(dir, name);
      try {
        await fs.writeFile(filePath, content, { encoding: 'utf-8', flag: 'wx' });
        return { category, path: filePath, createdAt };
      } catch (error) {
        if (!isAlreadyExists(error)) throw error;
      }
    }

    throw new Error(`Could not find a free file name for ${baseName}${extension} in ${dir}`);
  }

  /**
   * Read and parse a JSON file from a category directory.
   * Returns undefined when the file does not exist.
   */
  async readJson(category: ArtifactCategory, fileName: string): Promise<unknown> {
    const filePath = path.join(this.dir(category), fileName);
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw error;
    }
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  }

  /**
   * List the file names written to a category, sorted.
   */
  async list(category: ArtifactCategory): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.dir(category));
      return entries.sort();
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
  }
}
