// Keyword-based intent routing with confirmation continuity and entity pre-search

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { Logger } from 'pino';
import { t, type Language } from '../i18n.js';
import { makeNoopLogger } from '../logger.js';
import type { AttachedContext, ContinuityState } from '../types/conversation.js';
import { INTENT_NAMES, type Continuation, type IntentDecision, type IntentName, type PresearchResult } from '../types/intent.js';
import type { EntityIndex } from './entityIndex.js';
import { INTENT_CATALOG } from './intents.js';
import type { ToolRegistry } from './toolRegistry.js';

const PRESEARCH_LIMIT = 30;
const MIN_TERM_LENGTH = 4;
const CHAT_MAX_WORDS = 5;
const CONFIRMATION_MAX_WORDS = 4;

const CATEGORIES = [
  'chat',
  'find',
  'create',
  'modify',
  'delete',
  'automation',
  'script',
  'dashboard',
  'html',
  'control',
  'query',
  'history',
  'config',
  'helper',
  'area',
  'notification',
  'repair',
] as const;

type Category = (typeof CATEGORIES)[number];

const phraseList = z.array(z.string());

const languageKeywordsSchema = z.object({
  chat: phraseList,
  find: phraseList,
  create: phraseList,
  modify: phraseList,
  delete: phraseList,
  automation: phraseList,
  script: phraseList,
  dashboard: phraseList,
  html: phraseList,
  control: phraseList,
  query: phraseList,
  history: phraseList,
  config: phraseList,
  helper: phraseList,
  area: phraseList,
  notification: phraseList,
  repair: phraseList,
  affirmative: phraseList,
  negative: phraseList,
  confirmation_markers: phraseList,
  stopwords: phraseList,
  aliases: z.record(phraseList),
});

const keywordFileSchema = z.object({
  languages: z.object({
    en: languageKeywordsSchema,
    it: languageKeywordsSchema,
    es: languageKeywordsSchema,
    fr: languageKeywordsSchema,
  }),
  device_classes: z.record(phraseList),
});

export type KeywordFile = z.infer<typeof keywordFileSchema>;

let keywordFile: KeywordFile | null = null;

export function loadKeywords(): KeywordFile {
  if (!keywordFile) {
    const raw: unknown = JSON.parse(readFileSync(new URL('../../data/keywords.json', import.meta.url), 'utf8'));
    keywordFile = keywordFileSchema.parse(raw);
  }
  return keywordFile;
}

/** Lowercase, accents removed. */
export function normalizeText(text: string): string {
  return text.normalize('NFD').replace(/\p{M}/gu, '').toLowerCase();
}

export function tokenize(text: string): string[] {
  return normalizeText(text)
    .split(/[^\p{L}\p{N}_]+/u)
    .filter((token) => token.length > 0);
}

const MARKUP_START = /<!DOCTYPE\b|<[a-z][\w-]*[\s/>]/i;
const HTML_CLOSE = '</html>';

/**
 * Remove embedded code and pasted markup so words inside a page (its visible
 * text included) never count as keywords. The markup span runs from the
 * first tag to `</html>`, or to the last `>` when the page is not closed.
 */
export function stripContextBlobs(text: string): string {
  let rest = text.replace(/```[\s\S]*?(```|$)/g, ' ');
  const start = rest.search(MARKUP_START);
  if (start >= 0) {
    const lower = rest.toLowerCase();
    const htmlEnd = lower.lastIndexOf(HTML_CLOSE);
    const lastTagEnd = rest.lastIndexOf('>');
    const end =
      htmlEnd >= start ? htmlEnd + HTML_CLOSE.length : lastTagEnd >= start ? lastTagEnd + 1 : rest.length;
    rest = `${rest.slice(0, start)} ${rest.slice(end)}`;
  }
  return rest.replace(/\s+/g, ' ').trim();
}

interface Pattern {
  tokens: string[];
  /** Last token matches as a word prefix (`automat*`) */
  prefix: boolean;
}

function compilePattern(phrase: string): Pattern {
  const trimmed = phrase.trim();
  return { tokens: tokenize(trimmed), prefix: trimmed.endsWith('*') };
}

function matchesAt(tokens: readonly string[], start: number, pattern: Pattern): boolean {
  const last = pattern.tokens.length - 1;
  return pattern.tokens.every((expected, offset) => {
    const actual = tokens[start + offset];
    if (actual === undefined) return false;
    return offset === last && pattern.prefix ? actual.startsWith(expected) : actual === expected;
  });
}

function containsPattern(tokens: readonly string[], pattern: Pattern): boolean {
  if (pattern.tokens.length === 0) return false;
  for (let start = 0; start + pattern.tokens.length <= tokens.length; start++) {
    if (matchesAt(tokens, start, pattern)) return true;
  }
  return false;
}

function startsWithPattern(tokens: readonly string[], pattern: Pattern): boolean {
  return pattern.tokens.length > 0 && matchesAt(tokens, 0, pattern);
}

interface CompiledLanguage {
  categories: Record<Category, Pattern[]>;
  affirmative: Pattern[];
  negative: Pattern[];
  confirmationMarkers: string[];
  stopwords: Set<string>;
  aliases: Map<string, string[]>;
}

function compileLanguage(source: z.infer<typeof languageKeywordsSchema>): CompiledLanguage {
  const categories: Record<Category, Pattern[]> = {
    chat: [],
    find: [],
    create: [],
    modify: [],
    delete: [],
    automation: [],
    script: [],
    dashboard: [],
    html: [],
    control: [],
    query: [],
    history: [],
    config: [],
    helper: [],
    area: [],
    notification: [],
    repair: [],
  };
  for (const category of CATEGORIES) {
    categories[category] = source[category].map(compilePattern);
  }
  return {
    categories,
    affirmative: source.affirmative.map(compilePattern),
    negative: source.negative.map(compilePattern),
    confirmationMarkers: source.confirmation_markers.map(normalizeText),
    stopwords: new Set(source.stopwords.flatMap(tokenize)),
    aliases: new Map(
      Object.entries(source.aliases).map(([key, values]) => [normalizeText(key), values.map(normalizeText)]),
    ),
  };
}

export interface ClassifyRequest {
  message: string;
  context?: AttachedContext;
  continuity: ContinuityState;
  language: Language;
  /** Live entities for pre-search; null when the platform is unavailable */
  entities?: EntityIndex | null;
}

export class IntentClassifier {
  private readonly languages: Record<Language, CompiledLanguage>;
  private readonly deviceClassTerms: Map<string, string>;

  constructor(
    private readonly registry: ToolRegistry,
    private readonly logger: Logger = makeNoopLogger(),
    keywords: KeywordFile = loadKeywords(),
  ) {
    this.languages = {
      en: compileLanguage(keywords.languages.en),
      it: compileLanguage(keywords.languages.it),
      es: compileLanguage(keywords.languages.es),
      fr: compileLanguage(keywords.languages.fr),
    };
    this.deviceClassTerms = new Map();
    for (const [deviceClass, terms] of Object.entries(keywords.device_classes)) {
      for (const term of terms) {
        this.deviceClassTerms.set(normalizeText(term), deviceClass);
      }
    }
  }

  classify(request: ClassifyRequest): IntentDecision {
    const { message, continuity, language } = request;
    const inherited = this.continuation(message, continuity, language);
    if (inherited) {
      const { intent, continuation } = inherited;
      const instruction = t(language, continuation === 'confirmed' ? 'proceed_instruction' : 'cancel_instruction');
      this.logger.debug({ intent, continuation }, 'Intent inherited from pending confirmation');
      return this.decision(intent, continuation, `${message}\n\n${instruction}`, emptyPresearch());
    }

    const tokens = tokenize(stripContextBlobs(message));
    const intent = this.match(tokens, request.context, language);
    const spec = INTENT_CATALOG[intent];
    const presearch =
      spec.entityPresearch && request.entities ? this.presearch(tokens, language, request.entities) : emptyPresearch();

    this.logger.debug(
      { intent, presearchMode: presearch.mode, presearchCount: presearch.entities.length },
      'Intent classified',
    );
    return this.decision(intent, 'fresh', message, presearch);
  }

  /**
   * True when an assistant reply ends by asking the user to confirm.
   */
  asksForConfirmation(text: string, language: Language): boolean {
    const normalized = normalizeText(text);
    const markers = this.activeLanguages(language).flatMap((l) => l.confirmationMarkers);
    const tail = normalized.slice(-300);
    // "(yes/no)" style markers count on their own, confirmation verbs only inside a question
    return markers.some((marker) => tail.includes(marker) && (marker.includes('/') || tail.includes('?')));
  }

  private continuation(
    message: string,
    continuity: ContinuityState,
    language: Language,
  ): { intent: IntentName; continuation: Continuation } | null {
    if (!continuity.awaitingConfirmation || continuity.lastIntent === null) return null;
    const intent = INTENT_NAMES.find((name) => name === continuity.lastIntent);
    if (!intent) return null;

    const tokens = tokenize(message);
    if (tokens.length === 0 || tokens.length > CONFIRMATION_MAX_WORDS) return null;

    const languages = this.activeLanguages(language);
    if (languages.some((l) => l.negative.some((p) => startsWithPattern(tokens, p)))) {
      return { intent, continuation: 'declined' };
    }
    if (languages.some((l) => l.affirmative.some((p) => startsWithPattern(tokens, p)))) {
      return { intent, continuation: 'confirmed' };
    }
    return null;
  }

  private match(tokens: readonly string[], context: AttachedContext | undefined, language: Language): IntentName {
    const languages = this.activeLanguages(language);
    const has = (category: Category): boolean =>
      languages.some((l) => l.categories[category].some((pattern) => containsPattern(tokens, pattern)));

    const automation = has('automation');
    const script = has('script');
    const dashboard = has('dashboard');
    const create = has('create');
    const modify = has('modify');
    const remove = has('delete');
    const subject = automation || script || dashboard;

    if (tokens.length <= CHAT_MAX_WORDS && has('chat') && !subject && !has('control')) {
      return 'chat';
    }
    // ahead of every other flow: "delete the automation I created" is still a delete
    if (remove && subject) return 'delete';
    if (automation && has('find') && !create && !modify) return 'find_automation';
    if (automation && modify) return 'modify_automation';
    if (script && modify) return 'modify_script';
    if (automation && create) return 'create_automation';
    if (script && create) return 'create_script';
    if (has('html') || context?.kind === 'html') return 'create_html_dashboard';
    if (dashboard && create) return 'create_dashboard';
    if (dashboard && modify) return 'modify_dashboard';
    if (has('config')) return 'config_edit';
    if (has('helper')) return 'helpers';
    if (has('notification')) return 'notifications';
    if (has('repair')) return 'query_repairs';
    if (has('history')) return 'query_history';
    if (has('control')) return 'control_device';
    if (has('area')) return 'areas';
    if (has('query')) return 'query_state';
    return 'generic';
  }

  /**
   * Device-class filtering first; keyword search only for terms with no
   * device-class mapping or when no entity carries the class.
   */
  private presearch(tokens: readonly string[], language: Language, index: EntityIndex): PresearchResult {
    const deviceClasses = [
      ...new Set(tokens.flatMap((token) => {
        const deviceClass = this.deviceClassTerms.get(token);
        return deviceClass === undefined ? [] : [deviceClass];
      })),
    ];
    if (deviceClasses.length > 0) {
      const entities = index.byDeviceClass(deviceClasses).slice(0, PRESEARCH_LIMIT);
      if (entities.length > 0) {
        return { mode: 'device_class', deviceClasses, terms: [], entities };
      }
    }

    const languages = this.activeLanguages(language);
    const isKeyword = (token: string): boolean =>
      languages.some(
        (l) =>
          l.stopwords.has(token) ||
          CATEGORIES.some((category) =>
            l.categories[category].some((pattern) => pattern.tokens.length === 1 && matchesAt([token], 0, pattern)),
          ),
      );

    const terms = new Set<string>();
    for (const token of tokens) {
      if (token.length < MIN_TERM_LENGTH || this.deviceClassTerms.has(token) || isKeyword(token)) continue;
      const aliases = languages.flatMap((l) => l.aliases.get(token) ?? []);
      for (const term of aliases.length > 0 ? aliases : [token]) {
        terms.add(term);
      }
    }
    if (terms.size === 0) {
      return { mode: 'none', deviceClasses, terms: [], entities: [] };
    }
    const list = [...terms];
    return { mode: 'keyword', deviceClasses, terms: list, entities: index.search(list, PRESEARCH_LIMIT) };
  }

  private decision(
    intent: IntentName,
    continuation: Continuation,
    effectiveMessage: string,
    presearch: PresearchResult,
  ): IntentDecision {
    const spec = INTENT_CATALOG[intent];
    return {
      intent,
      tools: this.registry.listTools(intent),
      promptFragment: spec.prompt,
      autoStopTools: spec.autoStopTools,
      maxRounds: spec.maxRounds,
      continuation,
      effectiveMessage,
      presearch,
    };
  }

  private activeLanguages(language: Language): CompiledLanguage[] {
    return language === 'en' ? [this.languages.en] : [this.languages[language], this.languages.en];
  }
}

function emptyPresearch(): PresearchResult {
  return { mode: 'none', deviceClasses: [], terms: [], entities: [] };
}

