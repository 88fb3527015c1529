/**
 * Syntax Highlighter
 *
 * Lexical, line-at-a-time highlighting. Each language family is a
 * configuration of one shared scanner; man pages have their own tokenizer.
 * Comments and strings never continue onto the next line.
 */

import keywordData from './keywords.json';
import type { LanguageTag } from './languages.ts';
import { ManTokenizer } from './man-tokenizer.ts';
import { SpanBuilder, isDigit, isWordStart, scanNumber, scanString, scanWord } from './scanner.ts';
import type { Span, Tokenizer } from './types.ts';

export interface ScannerConfig {
  /** Marker that starts a rest-of-line comment, if the language has one */
  lineComment: string | null;
  /** Accept hex letters and x/X inside numbers */
  hexNumbers: boolean;
  keywords: readonly string[];
  caseInsensitiveKeywords?: boolean;
}

/**
 * Scanner for one language family.
 */
export class LexicalTokenizer implements Tokenizer {
  readonly name: string;
  private readonly config: ScannerConfig;
  private readonly keywords: ReadonlySet<string>;

  constructor(name: string, config: ScannerConfig) {
    this.name = name;
    this.config = config;
    this.keywords = new Set(
      config.caseInsensitiveKeywords ? config.keywords.map((k) => k.toLowerCase()) : config.keywords
    );
  }

  isKeyword(word: string): boolean {
    return this.keywords.has(this.config.caseInsensitiveKeywords ? word.toLowerCase() : word);
  }

  tokenize(line: string): Span[] {
    const out = new SpanBuilder();
    const comment = this.config.lineComment;
    let i = 0;

    while (i < line.length) {
      const ch = line[i];

      if (comment !== null && line.startsWith(comment, i)) {
        out.push(i, line.length, 'comment');
        break;
      }

      if (ch === '"' || ch === "'") {
        const end = scanString(line, i);
        out.push(i, end, 'string');
        i = end;
        continue;
      }

      if (isDigit(ch)) {
        const end = scanNumber(line, i, this.config.hexNumbers);
        out.push(i, end, 'number');
        i = end;
        continue;
      }

      if (isWordStart(ch)) {
        const end = scanWord(line, i);
        if (this.isKeyword(line.slice(i, end))) {
          out.push(i, end, 'keyword', true);
        } else {
          out.push(i, end, 'normal');
        }
        i = end;
        continue;
      }

      out.push(i, i + 1, 'normal');
      i++;
    }

    return out.build();
  }
}

/**
 * No highlighting: the whole line is one normal span.
 */
export class PlainTokenizer implements Tokenizer {
  readonly name = 'plain';

  tokenize(line: string): Span[] {
    return line.length === 0 ? [] : [{ start: 0, end: line.length, style: 'normal', emphasis: false }];
  }
}

// ============================================
// Registry
// ============================================

const KEYWORDS: Readonly<Record<string, readonly string[]>> = keywordData;

function keywordsFor(language: string): readonly string[] {
  return KEYWORDS[language] ?? [];
}

const SCANNER_CONFIGS: ReadonlyArray<[LanguageTag, ScannerConfig]> = [
  ['c', { lineComment: '//', hexNumbers: true, keywords: keywordsFor('c') }],
  ['cpp', { lineComment: '//', hexNumbers: true, keywords: keywordsFor('cpp') }],
  ['java', { lineComment: '//', hexNumbers: true, keywords: keywordsFor('java') }],
  ['javascript', { lineComment: '//', hexNumbers: true, keywords: keywordsFor('javascript') }],
  ['typescript', { lineComment: '//', hexNumbers: true, keywords: keywordsFor('typescript') }],
  ['css', { lineComment: '//', hexNumbers: true, keywords: keywordsFor('css') }],
  ['rust', { lineComment: '//', hexNumbers: true, keywords: keywordsFor('rust') }],
  ['go', { lineComment: '//', hexNumbers: true, keywords: keywordsFor('go') }],
  ['php', { lineComment: '//', hexNumbers: true, keywords: keywordsFor('php') }],
  ['python', { lineComment: '#', hexNumbers: false, keywords: keywordsFor('python') }],
  ['shell', { lineComment: '#', hexNumbers: false, keywords: keywordsFor('shell') }],
  ['ruby', { lineComment: '#', hexNumbers: false, keywords: keywordsFor('ruby') }],
  ['yaml', { lineComment: '#', hexNumbers: false, keywords: keywordsFor('yaml') }],
  [
    'sql',
    { lineComment: '--', hexNumbers: false, keywords: keywordsFor('sql'), caseInsensitiveKeywords: true },
  ],
  ['json', { lineComment: null, hexNumbers: true, keywords: keywordsFor('json') }],
  ['html', { lineComment: null, hexNumbers: true, keywords: [] }],
  ['xml', { lineComment: null, hexNumbers: true, keywords: [] }],
  ['markdown', { lineComment: null, hexNumbers: true, keywords: [] }],
];

function buildRegistry(): Map<LanguageTag, Tokenizer> {
  const registry = new Map<LanguageTag, Tokenizer>();
  registry.set('none', new PlainTokenizer());
  registry.set('man', new ManTokenizer());
  for (const [tag, config] of SCANNER_CONFIGS) {
    registry.set(tag, new LexicalTokenizer(tag, config));
  }
  return registry;
}

const registry = buildRegistry();

export function getTokenizer(language: LanguageTag): Tokenizer {
  return registry.get(language) ?? registry.get('none') ?? new PlainTokenizer();
}

/**
 * Tokenize one line for the given language.
 */
export function tokenize(line: string, language: LanguageTag): Span[] {
  return getTokenizer(language).tokenize(line);
}
