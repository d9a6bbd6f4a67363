import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Manifest } from './interface.js';
import { fileExists } from './json.js';

/** A direct child element of <project> */
interface ElementRange {
  name: string;
  /** Offset of the opening tag */
  start: number;
  contentStart: number;
  contentEnd: number;
  /** Offset just past the closing tag */
  end: number;
}

const TAG_PATTERN =
  /<!--[\s\S]*?-->|<\?[\s\S]*?\?>|<!\[CDATA\[[\s\S]*?\]\]>|<![A-Z][^>]*>|<(\/?)([A-Za-z_][\w:.-]*)(?:\s[^>]*?)?(\/?)>/;

/**
 * Locate the direct children of the root element.
 *
 * Only the project's own coordinates matter; <parent>, <dependencies> and
 * plugin blocks carry artifactId/version elements of their own.
 */
export function topLevelElements(content: string): ElementRange[] {
  const pattern = new RegExp(TAG_PATTERN.source, 'g');
  const stack: Array<{ name: string; start: number; contentStart: number }> = [];
  const elements: ElementRange[] = [];

  let match: RegExpExecArray | null;
  while ((match = pattern.exec(content)) !== null) {
    const [tag, closing, name, selfClosing] = match;
    if (!name) continue;

    if (closing) {
      const open = stack.pop();
      if (open && stack.length === 1) {
        elements.push({
          name: open.name,
          start: open.start,
          contentStart: open.contentStart,
          contentEnd: match.index,
          end: match.index + tag.length,
        });
      }
    } else if (!selfClosing) {
      stack.push({ name, start: match.index, contentStart: match.index + tag.length });
    }
  }

  return elements;
}

/**
 * Manifest handler for Maven pom.xml files.
 *
 * Edits the project's own <version> in place; the rest of the file,
 * including the <parent> coordinates, is left untouched.
 */
export class PomManifest implements Manifest {
  readonly type = 'pom';
  readonly path = 'pom.xml';
  private readonly root: string;

  constructor(root: string = process.cwd()) {
    this.root = root;
  }

  get fullPath(): string {
    return join(this.root, this.path);
  }

  async exists(): Promise<boolean> {
    return await fileExists(this.fullPath);
  }

  private async readElement(name: string): Promise<string | null> {
    let content: string;
    try {
      content = await readFile(this.fullPath, 'utf8');
    } catch {
      return null;
    }
    const element = topLevelElements(content).find((e) => e.name === name);
    if (!element) return null;

    const value = content.slice(element.contentStart, element.contentEnd).trim();
    return value || null;
  }

  async getName(): Promise<string | null> {
    return await this.readElement('artifactId');
  }

  /** The project's own version; null when it is inherited from the parent */
  async getVersion(): Promise<string | null> {
    return await this.readElement('version');
  }

  async setVersion(version: string): Promise<void> {
    const content = await readFile(this.fullPath, 'utf8');
    const elements = topLevelElements(content);

    const existing = elements.find((e) => e.name === 'version');
    if (existing) {
      await writeFile(
        this.fullPath,
        content.slice(0, existing.contentStart) + version + content.slice(existing.contentEnd),
      );
      return;
    }

    // Inherited version: declare one right after <artifactId>
    const artifactId = elements.find((e) => e.name === 'artifactId');
    if (!artifactId) {
      throw new Error(`${this.path} has no project <artifactId>`);
    }
    const lineStart = content.lastIndexOf('\n', artifactId.start) + 1;
    const indent = content.slice(lineStart, artifactId.start).match(/^\s*/)?.[0] ?? '';
    await writeFile(
      this.fullPath,
      content.slice(0, artifactId.end) +
        `\n${indent}<version>${version}</version>` +
        content.slice(artifactId.end),
    );
  }
}

/**
 * Create a PomManifest if pom.xml exists
 */
export async function createPomManifest(root: string = process.cwd()): Promise<PomManifest | null> {
  const manifest = new PomManifest(root);
  if (await manifest.exists()) {
    return manifest;
  }
  return null;
}
