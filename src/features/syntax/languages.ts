/**
 * Language Classification
 *
 * Maps a path or label to a language tag by exact, case-sensitive
 * extension match, with a man-page fallback.
 */

export type LanguageTag =
  | 'none'
  | 'c'
  | 'cpp'
  | 'python'
  | 'java'
  | 'javascript'
  | 'typescript'
  | 'html'
  | 'css'
  | 'shell'
  | 'markdown'
  | 'man'
  | 'rust'
  | 'go'
  | 'ruby'
  | 'php'
  | 'sql'
  | 'json'
  | 'xml'
  | 'yaml';

/**
 * Extension (with leading dot) to language tag.
 */
export const EXTENSION_LANGUAGES: Readonly<Record<string, LanguageTag>> = {
  '.c': 'c',
  '.h': 'c',
  '.cpp': 'cpp',
  '.cc': 'cpp',
  '.cxx': 'cpp',
  '.hpp': 'cpp',
  '.hh': 'cpp',
  '.py': 'python',
  '.java': 'java',
  '.js': 'javascript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.jsx': 'javascript',
  '.ts': 'typescript',
  '.tsx': 'typescript',
  '.mts': 'typescript',
  '.cts': 'typescript',
  '.html': 'html',
  '.htm': 'html',
  '.css': 'css',
  '.sh': 'shell',
  '.bash': 'shell',
  '.zsh': 'shell',
  '.md': 'markdown',
  '.markdown': 'markdown',
  '.rs': 'rust',
  '.go': 'go',
  '.rb': 'ruby',
  '.php': 'php',
  '.sql': 'sql',
  '.json': 'json',
  '.xml': 'xml',
  '.yaml': 'yaml',
  '.yml': 'yaml',
};

/**
 * Extension of the last path component, including the dot.
 * Returns '' when there is none.
 */
export function extensionOf(pathOrLabel: string): string {
  const slash = pathOrLabel.lastIndexOf('/');
  const base = pathOrLabel.slice(slash + 1);
  const dot = base.lastIndexOf('.');
  return dot === -1 ? '' : base.slice(dot);
}

export function classify(pathOrLabel: string): LanguageTag {
  const byExtension = EXTENSION_LANGUAGES[extensionOf(pathOrLabel)];
  if (byExtension) return byExtension;

  if (pathOrLabel.includes('/man/') || pathOrLabel.includes('.man')) {
    return 'man';
  }
  return 'none';
}
