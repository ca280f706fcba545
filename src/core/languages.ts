/**
 * Centralized language registry
 * Single source of truth for file extensions and the words a prompt may use to name a language
 */

export type Language =
  | 'typescript'
  | 'javascript'
  | 'python'
  | 'go'
  | 'rust'
  | 'java'
  | 'kotlin'
  | 'scala'
  | 'c'
  | 'cpp'
  | 'csharp'
  | 'ruby'
  | 'php'
  | 'swift'
  | 'shell'
  | 'sql'
  | 'markdown'
  | 'yaml'
  | 'json'
  | 'toml'
  | 'html'
  | 'css'
  | 'unknown';

export interface LanguageDefinition {
  id: Exclude<Language, 'unknown'>;
  name: string;
  extensions: readonly string[];
  /** Lower-cased words that name this language in a prompt */
  aliases: readonly string[];
}

export const LANGUAGES: readonly LanguageDefinition[] = [
  { id: 'typescript', name: 'TypeScript', extensions: ['.ts', '.tsx', '.mts', '.cts'], aliases: ['typescript', 'ts', 'tsx'] },
  { id: 'javascript', name: 'JavaScript', extensions: ['.js', '.jsx', '.mjs', '.cjs'], aliases: ['javascript', 'js', 'jsx', 'nodejs'] },
  { id: 'python', name: 'Python', extensions: ['.py', '.pyi'], aliases: ['python', 'py'] },
  { id: 'go', name: 'Go', extensions: ['.go'], aliases: ['golang', 'go'] },
  { id: 'rust', name: 'Rust', extensions: ['.rs'], aliases: ['rust', 'rs'] },
  { id: 'java', name: 'Java', extensions: ['.java'], aliases: ['java'] },
  { id: 'kotlin', name: 'Kotlin', extensions: ['.kt', '.kts'], aliases: ['kotlin', 'kt'] },
  { id: 'scala', name: 'Scala', extensions: ['.scala'], aliases: ['scala'] },
  { id: 'c', name: 'C', extensions: ['.c', '.h'], aliases: [] },
  { id: 'cpp', name: 'C++', extensions: ['.cpp', '.cc', '.cxx', '.hpp', '.hh'], aliases: ['cpp', 'cxx'] },
  { id: 'csharp', name: 'C#', extensions: ['.cs'], aliases: ['csharp', 'dotnet'] },
  { id: 'ruby', name: 'Ruby', extensions: ['.rb'], aliases: ['ruby', 'rb', 'rails'] },
  { id: 'php', name: 'PHP', extensions: ['.php'], aliases: ['php'] },
  { id: 'swift', name: 'Swift', extensions: ['.swift'], aliases: ['swift'] },
  { id: 'shell', name: 'Shell', extensions: ['.sh', '.bash', '.zsh'], aliases: ['shell', 'bash', 'zsh', 'sh'] },
  { id: 'sql', name: 'SQL', extensions: ['.sql'], aliases: ['sql'] },
  { id: 'markdown', name: 'Markdown', extensions: ['.md', '.mdx'], aliases: ['markdown', 'md'] },
  { id: 'yaml', name: 'YAML', extensions: ['.yml', '.yaml'], aliases: ['yaml', 'yml'] },
  { id: 'json', name: 'JSON', extensions: ['.json'], aliases: ['json'] },
  { id: 'toml', name: 'TOML', extensions: ['.toml'], aliases: ['toml'] },
  { id: 'html', name: 'HTML', extensions: ['.html', '.htm'], aliases: ['html'] },
  { id: 'css', name: 'CSS', extensions: ['.css', '.scss', '.sass', '.less'], aliases: ['css', 'scss', 'sass'] },
] as const;

const BY_EXTENSION = new Map<string, Language>(
  LANGUAGES.flatMap(l => l.extensions.map(ext => [ext, l.id] as const))
);

const BY_ALIAS = new Map<string, Language>(
  LANGUAGES.flatMap(l => l.aliases.map(alias => [alias, l.id] as const))
);

export const ALL_EXTENSIONS: readonly string[] = LANGUAGES.flatMap(l => l.extensions);

/**
 * Infer a language from a file extension (including the dot).
 */
export function languageForExtension(extension: string): Language {
  return BY_EXTENSION.get(extension.toLowerCase()) ?? 'unknown';
}

/**
 * Resolve a prompt word to the language it names, if any.
 */
export function languageForWord(word: string): Language | undefined {
  return BY_ALIAS.get(word.toLowerCase());
}

export function isKnownExtension(extension: string): boolean {
  return BY_EXTENSION.has(extension.toLowerCase());
}
