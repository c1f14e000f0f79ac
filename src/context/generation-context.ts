import fs from 'node:fs';
import path from 'node:path';
import type { CodeSymbol } from '../parser/front-end.js';
import { getFrontEnd } from '../parser/front-ends.js';

/**
 * Full source files behind a set of generation targets, in first-seen order.
 */
export interface ContextBundle {
  targetNames: Set<string>;
  files: Map<string, string>;
}

export interface RenderedContext {
  text: string;
  includedFiles: string[];
  omittedFiles: string[];
  truncated: boolean;
}

function localImports(rootDir: string, file: string, content: string, knownFiles: ReadonlySet<string>): string[] {
  const frontEnd = getFrontEnd(file);
  if (!frontEnd) return [];
  const parsed = frontEnd.parseFile(content, file);
  if (parsed.syntaxError) return [];

  const files: string[] = [];
  for (const binding of frontEnd.extractImports(parsed.root)) {
    const submodule = frontEnd.submoduleSpecifier(binding.module, binding.importedName);
    const candidates = submodule ? [submodule, binding.module] : [binding.module];
    for (const specifier of candidates) {
      const resolution = frontEnd.resolveModule(specifier, file, knownFiles);
      if (resolution.kind !== 'local') continue;
      if (fs.existsSync(path.join(rootDir, resolution.file))) files.push(resolution.file);
      break;
    }
  }
  return files;
}

/**
 * Read every file holding a target, then the local modules those files
 * import. Target files come first, dependencies after, each once.
 */
export function buildContextBundle(rootDir: string, targets: CodeSymbol[], knownFiles: ReadonlySet<string>): ContextBundle {
  const bundle: ContextBundle = { targetNames: new Set(), files: new Map() };
  for (const target of targets) {
    bundle.targetNames.add(target.qualifiedName);
    if (!bundle.files.has(target.file)) {
      bundle.files.set(target.file, fs.readFileSync(path.join(rootDir, target.file), 'utf-8'));
    }
  }

  const dependencies: string[] = [];
  for (const [file, content] of bundle.files) {
    dependencies.push(...localImports(rootDir, file, content, knownFiles));
  }
  for (const file of dependencies) {
    if (!bundle.files.has(file)) bundle.files.set(file, fs.readFileSync(path.join(rootDir, file), 'utf-8'));
  }
  return bundle;
}

function fileLabel(file: string): string {
  const prefix = getFrontEnd(file)?.commentPrefix ?? '#';
  return `${prefix} File: ${file}`;
}

/**
 * Render the bundle as one labelled blob no longer than `maxChars`. Files are
 * kept whole and in order; a file that does not fit is skipped and later
 * files are still tried. Only when the first file alone exceeds the budget
 * is it cut, ending with a truncation marker.
 */
export function renderContextBundle(bundle: ContextBundle, maxChars: number): RenderedContext {
  const blocks: string[] = [];
  const includedFiles: string[] = [];
  const omittedFiles: string[] = [];
  let used = 0;
  let truncated = false;

  for (const [file, content] of bundle.files) {
    const block = `${fileLabel(file)}\n${content}`;
    const separator = blocks.length > 0 ? 2 : 0;
    if (used + separator + block.length <= maxChars) {
      blocks.push(block);
      includedFiles.push(file);
      used += separator + block.length;
      continue;
    }

    truncated = true;
    if (blocks.length === 0) {
      const marker = `\n${getFrontEnd(file)?.commentPrefix ?? '#'} ... truncated`;
      const cut = block.slice(0, Math.max(0, maxChars - marker.length)) + marker;
      blocks.push(cut);
      includedFiles.push(file);
      used = cut.length;
    } else {
      omittedFiles.push(file);
    }
  }

  return { text: blocks.join('\n\n'), includedFiles, omittedFiles, truncated };
}
