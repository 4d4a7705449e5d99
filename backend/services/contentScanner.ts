/**
 * Content Safety Scanner
 * Pattern checks over submitted text: markup injection, query injection,
 * the spam keyword list and, for display names, known bot nickname templates.
 *
 * Input is capped before matching and no pattern nests quantifiers, so a
 * match costs at most linear time in the capped length.
 */
import { WatchedListFile } from './listFile';
import { DEFAULT_NICKNAME_TEMPLATES, FIELD_LIMITS } from '../config/constants';

export type ScanCategory = 'markup' | 'query' | 'keyword' | 'nickname';
export type ScannedField = 'content' | 'nickname' | 'url';

export type ScanResult =
  | { safe: true }
  | { safe: false; category: ScanCategory; reason: string; rule: string };

interface NamedPattern {
  pattern: RegExp;
  name: string;
}

// Reasons shown to the submitter never include the matched text
const GENERIC_REASONS: Record<ScanCategory, string> = {
  markup: 'Submission contains disallowed markup',
  query: 'Submission contains disallowed content',
  keyword: 'Submission contains disallowed content',
  nickname: 'Nickname requires review'
};

const MARKUP_PATTERNS: NamedPattern[] = [
  { pattern: /<[a-z!/?]/i, name: 'tag opener' },
  { pattern: /\b(?:javascript|vbscript)\s*:/i, name: 'script scheme' },
  { pattern: /\bdata\s*:\s*[a-z]+\/[a-z0-9.+-]+/i, name: 'data scheme' },
  {
    pattern: /\bon(?:load|unload|error|click|dblclick|mouse[a-z]*|key[a-z]*|focus[a-z]*|blur|change|submit|input|reset|select|abort|animation[a-z]*|transition[a-z]*|pointer[a-z]*|touch[a-z]*|drag[a-z]*|toggle|begin|end|wheel|scroll|resize|message|pageshow|hashchange)\s*=/i,
    name: 'event handler attribute'
  },
  { pattern: /\bexpression\s*\(/i, name: 'css expression' },
  { pattern: /\burl\s*\(/i, name: 'css url' }
];

const QUERY_PATTERNS: NamedPattern[] = [
  { pattern: /['"]\s*(?:or|and)\s+['"]?\w+['"]?\s*=\s*['"]?\w/i, name: 'quoted tautology' },
  { pattern: /\bor\s+(\d+)\s*=\s*\1\b/i, name: 'numeric tautology' },
  { pattern: /;\s*(?:drop|delete|insert|update|alter|create|truncate|exec|execute|grant|shutdown)\b/i, name: 'stacked statement' },
  { pattern: /\bunion\s+(?:all\s+)?select\b/i, name: 'union select' },
  { pattern: /['"]\s*(?:--|#|\/\*)/, name: 'comment after quote' }
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Template phrase followed by an optional separator and digits, whole name
 */
export function compileNicknameTemplates(phrases: readonly string[]): NamedPattern[] {
  return phrases
    .map(phrase => phrase.trim())
    .filter(phrase => phrase.length > 0)
    .map(phrase => ({
      pattern: new RegExp(`^${escapeRegExp(phrase)}[_.-]?\\d*$`, 'i'),
      name: `nickname template ${phrase}`
    }));
}

/**
 * Hot-reloadable spam keyword list, matched case-insensitively as substrings
 */
export class KeywordList extends WatchedListFile {
  constructor(filePath: string) {
    super(filePath, entry => entry.toLowerCase());
  }

  findIn(text: string): string | undefined {
    const haystack = text.toLowerCase();
    for (const keyword of this.entries) {
      if (haystack.includes(keyword)) return keyword;
    }
    return undefined;
  }
}

export interface ContentScannerOptions {
  keywords?: KeywordList;
  nicknameTemplates?: readonly string[];
  maxScanLength?: number;
}

export class ContentScanner {
  private readonly keywords?: KeywordList;
  private readonly nicknamePatterns: NamedPattern[];
  private readonly maxScanLength: number;

  constructor(options: ContentScannerOptions = {}) {
    this.keywords = options.keywords;
    this.nicknamePatterns = compileNicknameTemplates(options.nicknameTemplates ?? DEFAULT_NICKNAME_TEMPLATES);
    this.maxScanLength = options.maxScanLength ?? FIELD_LIMITS.SCAN_MAX_LENGTH;
  }

  scan(text: string, field: ScannedField = 'content'): ScanResult {
    const input = text.slice(0, this.maxScanLength);

    const markup = firstMatch(MARKUP_PATTERNS, input);
    if (markup) return unsafe('markup', markup);

    // URLs legitimately carry quotes, semicolons and `#` fragments
    if (field !== 'url') {
      const query = firstMatch(QUERY_PATTERNS, input);
      if (query) return unsafe('query', query);
    }

    const keyword = this.keywords?.findIn(input);
    if (keyword !== undefined) return unsafe('keyword', 'spam keyword');

    if (field === 'nickname') {
      const template = firstMatch(this.nicknamePatterns, input.trim());
      if (template) return unsafe('nickname', template);
    }

    return { safe: true };
  }
}

function firstMatch(patterns: readonly NamedPattern[], input: string): string | undefined {
  return patterns.find(({ pattern }) => pattern.test(input))?.name;
}

function unsafe(category: ScanCategory, rule: string): ScanResult {
  return { safe: false, category, reason: GENERIC_REASONS[category], rule };
}

export default ContentScanner;
