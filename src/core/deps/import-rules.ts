/**
 * Per-language import extraction and resolution.
 *
 * Each rule is a pair of pure functions: `extract` pulls referenced module
 * strings out of source text with a handful of regular expressions, and
 * `resolve` maps one reference onto known files. Languages are added by
 * registering another rule; nothing downstream branches on language.
 */

import { posix } from 'node:path';
import type { Language } from '../languages.js';
import type { FileIndex } from './file-index.js';

export type ImportGroup = 'ecmascript' | 'python' | 'go' | 'c-family' | 'jvm' | 'rust' | 'ruby' | 'css';

export interface ResolveContext {
  /** Root-relative path of the importing file */
  fromPath: string;
  files: FileIndex;
}

export interface ImportRule {
  group: ImportGroup;
  languages: readonly Language[];
  /** Referenced module strings, in order of first appearance, without duplicates */
  extract(content: string): string[];
  /** Known files a reference points at; empty when it cannot be resolved */
  resolve(reference: string, context: ResolveContext): string[];
}

/**
 * Collect capture group 1 of every match of every pattern, first appearance wins.
 */
function collect(content: string, patterns: readonly RegExp[]): string[] {
  const seen = new Set<string>();
  for (const pattern of patterns) {
    for (const match of content.matchAll(pattern)) {
      const value = match[1]?.trim();
      if (value) {
        seen.add(value);
      }
    }
  }
  return Array.from(seen);
}

function found(path: string | undefined): string[] {
  return path === undefined ? [] : [path];
}

// ---------------------------------------------------------------------------
// JavaScript / TypeScript
// ---------------------------------------------------------------------------

const ES_PATTERNS = [
  /\bimport\s+(?:type\s+)?(?:[\w$*{}\s,]+?\s+from\s+)?['"]([^'"\n]+)['"]/g,
  /\bexport\s+(?:type\s+)?(?:\*(?:\s+as\s+[\w$]+)?|\{[^}]*\})\s+from\s+['"]([^'"\n]+)['"]/g,
  /\brequire\s*\(\s*['"]([^'"\n]+)['"]\s*\)/g,
  /\bimport\s*\(\s*['"]([^'"\n]+)['"]\s*\)/g,
] as const;

const ES_EXTENSIONS = ['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs', '.json'] as const;
const ES_INDEX_EXTENSIONS = ['.ts', '.tsx', '.js', '.jsx', '.mjs', '.cjs'] as const;

// Compiled-output specifiers (`./x.js`) written against TypeScript sources
const ES_SOURCE_SWAPS: Readonly<Record<string, readonly string[]>> = {
  '.js': ['.ts', '.tsx'],
  '.jsx': ['.tsx'],
  '.mjs': ['.mts'],
  '.cjs': ['.cts'],
};

export const ecmascriptRule: ImportRule = {
  group: 'ecmascript',
  languages: ['typescript', 'javascript'],
  extract: content => collect(content, ES_PATTERNS),
  resolve(reference, { fromPath, files }) {
    if (!reference.startsWith('./') && !reference.startsWith('../')) {
      // Bare specifiers name packages outside the tree
      return [];
    }
    const base = posix.join(posix.dirname(fromPath), reference);
    const ext = posix.extname(base);
    const stem = ext ? base.slice(0, -ext.length) : base;
    const swaps = ES_SOURCE_SWAPS[ext] ?? [];

    return found(
      files.firstExisting([
        base,
        ...swaps.map(swap => stem + swap),
        ...ES_EXTENSIONS.map(e => base + e),
        ...ES_INDEX_EXTENSIONS.map(e => `${base}/index${e}`),
      ])
    );
  },
};

// ---------------------------------------------------------------------------
// Python
// ---------------------------------------------------------------------------

const PY_FROM = /^[ \t]*from[ \t]+(\.*[\w.]*)[ \t]+import[ \t]+\(?([^\n#)]*)/gm;
const PY_IMPORT = /^[ \t]*import[ \t]+([\w.]+(?:[ \t]*,[ \t]*[\w.]+)*)/gm;

function pythonModuleCandidates(base: string): string[] {
  return base ? [`${base}.py`, `${base}/__init__.py`] : [];
}

export const pythonRule: ImportRule = {
  group: 'python',
  languages: ['python'],
  extract(content) {
    const refs = new Set<string>();
    for (const match of content.matchAll(PY_FROM)) {
      const module = match[1] ?? '';
      if (!module) {
        continue;
      }
      refs.add(module);
      // `from pkg import sub` may name a submodule
      const names = (match[2] ?? '')
        .split(',')
        .map(n => n.trim().split(/\s+as\s+/)[0]?.trim() ?? '')
        .filter(n => /^\w+$/.test(n));
      for (const name of names) {
        refs.add(module.endsWith('.') ? module + name : `${module}.${name}`);
      }
    }
    for (const match of content.matchAll(PY_IMPORT)) {
      for (const module of (match[1] ?? '').split(',')) {
        const trimmed = module.trim();
        if (trimmed) {
          refs.add(trimmed);
        }
      }
    }
    return Array.from(refs);
  },
  resolve(reference, { fromPath, files }) {
    const dots = /^\.*/.exec(reference)?.[0].length ?? 0;
    const parts = reference.slice(dots).split('.').filter(Boolean);
    const modulePath = parts.join('/');

    if (dots > 0) {
      let baseDir = posix.dirname(fromPath);
      for (let i = 1; i < dots; i++) {
        baseDir = posix.dirname(baseDir);
      }
      if (dots - 1 > posix.dirname(fromPath).split('/').filter(p => p !== '.').length) {
        return [];
      }
      const base = posix.join(baseDir, modulePath);
      return found(files.firstExisting(modulePath ? pythonModuleCandidates(base) : [`${baseDir}/__init__.py`]));
    }

    const roots = [posix.dirname(fromPath), '.', 'src'];
    return found(
      files.firstExisting(roots.flatMap(root => pythonModuleCandidates(posix.join(root, modulePath))))
    );
  },
};

// ---------------------------------------------------------------------------
// Go
// ---------------------------------------------------------------------------

const GO_SINGLE = /\bimport[ \t]+(?:[\w.]+[ \t]+)?"([^"\n]+)"/g;
const GO_BLOCK = /\bimport\s*\(([^)]*)\)/g;
const GO_BLOCK_ENTRY = /"([^"\n]+)"/g;

export const goRule: ImportRule = {
  group: 'go',
  languages: ['go'],
  extract(content) {
    const refs = new Set(collect(content, [GO_SINGLE]));
    for (const block of content.matchAll(GO_BLOCK)) {
      for (const ref of collect(block[1] ?? '', [GO_BLOCK_ENTRY])) {
        refs.add(ref);
      }
    }
    return Array.from(refs);
  },
  resolve(reference, { fromPath, files }) {
    let packageDir: string | undefined;
    if (reference.startsWith('./') || reference.startsWith('../')) {
      packageDir = posix.join(posix.dirname(fromPath), reference);
    } else {
      // Module paths end with the package directory; the longest match wins
      for (const dir of files.directories()) {
        if (dir === '.' || !(reference === dir || reference.endsWith(`/${dir}`))) {
          continue;
        }
        if (packageDir === undefined || dir.length > packageDir.length) {
          packageDir = dir;
        }
      }
    }
    if (packageDir === undefined) {
      return [];
    }
    return files
      .filesIn(packageDir)
      .filter(p => p.endsWith('.go') && !p.endsWith('_test.go') && p !== fromPath);
  },
};

// ---------------------------------------------------------------------------
// C / C++
// ---------------------------------------------------------------------------

const C_INCLUDE = /^[ \t]*#[ \t]*include[ \t]*[<"]([^>"\n]+)[>"]/gm;

export const cFamilyRule: ImportRule = {
  group: 'c-family',
  languages: ['c', 'cpp'],
  extract: content => collect(content, [C_INCLUDE]),
  resolve(reference, { fromPath, files }) {
    return found(
      files.firstExisting([
        posix.join(posix.dirname(fromPath), reference),
        reference,
        posix.join('include', reference),
        posix.join('src', reference),
      ])
    );
  },
};

// ---------------------------------------------------------------------------
// Java / Kotlin / Scala
// ---------------------------------------------------------------------------

const JVM_IMPORT = /^[ \t]*import[ \t]+(?:static[ \t]+)?([\w.]+?)(\.\*|\._)?[ \t]*;?[ \t]*(?:as[ \t]+\w+[ \t]*)?$/gm;
const JVM_EXTENSIONS = ['.java', '.kt', '.scala'] as const;

export const jvmRule: ImportRule = {
  group: 'jvm',
  languages: ['java', 'kotlin', 'scala'],
  extract(content) {
    const refs = new Set<string>();
    for (const match of content.matchAll(JVM_IMPORT)) {
      // Wildcard imports name a package, not a file
      if (match[2] || !match[1]) {
        continue;
      }
      refs.add(match[1]);
    }
    return Array.from(refs);
  },
  resolve(reference, { files }) {
    const segments = reference.split('.');
    // Static imports end in a member name; retry without it
    for (const length of [segments.length, segments.length - 1]) {
      if (length < 2) {
        break;
      }
      const suffix = segments.slice(0, length).join('/');
      for (const ext of JVM_EXTENSIONS) {
        const match = files.withSuffix(suffix + ext)[0];
        if (match) {
          return [match];
        }
      }
    }
    return [];
  },
};

// ---------------------------------------------------------------------------
// Rust
// ---------------------------------------------------------------------------

const RUST_MOD = /^[ \t]*(?:pub(?:\([^)]*\))?[ \t]+)?mod[ \t]+(\w+)[ \t]*;/gm;
const RUST_USE = /^[ \t]*(?:pub(?:\([^)]*\))?[ \t]+)?use[ \t]+((?:crate|self|super)(?:::\w+)+)/gm;

const RUST_MODULE_ROOTS = new Set(['mod.rs', 'lib.rs', 'main.rs']);

/** Directory holding the submodules of the module defined by `fromPath` */
function rustModuleDir(fromPath: string): string {
  const dir = posix.dirname(fromPath);
  const base = posix.basename(fromPath);
  return RUST_MODULE_ROOTS.has(base) ? dir : posix.join(dir, base.replace(/\.rs$/, ''));
}

function rustCrateRoot(fromPath: string): string {
  const segments = fromPath.split('/');
  const src = segments.lastIndexOf('src');
  return src >= 0 ? segments.slice(0, src + 1).join('/') : posix.dirname(fromPath);
}

export const rustRule: ImportRule = {
  group: 'rust',
  languages: ['rust'],
  extract(content) {
    const mods = collect(content, [RUST_MOD]).map(name => `mod:${name}`);
    const uses = collect(content, [RUST_USE]).map(path => `use:${path}`);
    return [...mods, ...uses];
  },
  resolve(reference, { fromPath, files }) {
    if (reference.startsWith('mod:')) {
      const name = reference.slice(4);
      const dir = rustModuleDir(fromPath);
      return found(files.firstExisting([`${dir}/${name}.rs`, `${dir}/${name}/mod.rs`]));
    }

    const [head, ...rest] = reference.slice(4).split('::');
    let base: string;
    if (head === 'crate') {
      base = rustCrateRoot(fromPath);
    } else if (head === 'super') {
      base = posix.dirname(rustModuleDir(fromPath));
    } else {
      base = rustModuleDir(fromPath);
    }

    // `use crate::a::b::Item` may end in an item name, so try shorter prefixes
    const candidates: string[] = [];
    for (let length = rest.length; length > 0; length--) {
      const modulePath = posix.join(base, ...rest.slice(0, length));
      candidates.push(`${modulePath}.rs`, `${modulePath}/mod.rs`);
    }
    return found(files.firstExisting(candidates));
  },
};

// ---------------------------------------------------------------------------
// Ruby
// ---------------------------------------------------------------------------

const RUBY_RELATIVE = /\brequire_relative[ \t]*\(?[ \t]*['"]([^'"\n]+)['"]/g;
const RUBY_REQUIRE = /\brequire[ \t]*\(?[ \t]*['"]([^'"\n]+)['"]/g;

export const rubyRule: ImportRule = {
  group: 'ruby',
  languages: ['ruby'],
  extract(content) {
    const relative = collect(content, [RUBY_RELATIVE]).map(ref => `relative:${ref}`);
    const required = collect(content, [RUBY_REQUIRE]).map(ref => `load:${ref}`);
    return [...relative, ...required];
  },
  resolve(reference, { fromPath, files }) {
    const withExt = (p: string): string[] => (p.endsWith('.rb') ? [p] : [`${p}.rb`, p]);
    if (reference.startsWith('relative:')) {
      return found(files.firstExisting(withExt(posix.join(posix.dirname(fromPath), reference.slice(9)))));
    }
    const ref = reference.slice(5);
    return found(files.firstExisting([...withExt(posix.join('lib', ref)), ...withExt(ref)]));
  },
};

// ---------------------------------------------------------------------------
// CSS / SCSS
// ---------------------------------------------------------------------------

const CSS_IMPORT = /@(?:import|use|forward)\s+(?:url\(\s*)?['"]([^'"\n]+)['"]/g;

export const cssRule: ImportRule = {
  group: 'css',
  languages: ['css'],
  extract: content => collect(content, [CSS_IMPORT]),
  resolve(reference, { fromPath, files }) {
    if (/^(?:[a-z]+:)?\/\//i.test(reference)) {
      return [];
    }
    const base = posix.join(posix.dirname(fromPath), reference);
    const partial = posix.join(posix.dirname(base), `_${posix.basename(base)}`);
    return found(
      files.firstExisting([base, `${base}.css`, `${base}.scss`, `${partial}.scss`, `${base}/index.scss`])
    );
  },
};

export const IMPORT_RULES: readonly ImportRule[] = [
  ecmascriptRule,
  pythonRule,
  goRule,
  cFamilyRule,
  jvmRule,
  rustRule,
  rubyRule,
  cssRule,
];

/**
 * Language-to-rule lookup. Later registrations replace earlier ones for the same language.
 */
export class ImportRuleRegistry {
  private readonly rules = new Map<Language, ImportRule>();

  constructor(rules: readonly ImportRule[] = IMPORT_RULES) {
    for (const rule of rules) {
      this.register(rule);
    }
  }

  register(rule: ImportRule): this {
    for (const language of rule.languages) {
      this.rules.set(language, rule);
    }
    return this;
  }

  ruleFor(language: Language): ImportRule | undefined {
    return this.rules.get(language);
  }

  languages(): Language[] {
    return Array.from(this.rules.keys()).sort();
  }
}
