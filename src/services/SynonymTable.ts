// src/services/SynonymTable.ts
import { z } from 'zod';
import synonymData from '../config/synonyms.json';
import { logger } from '../utils/logger.js';

export const SynonymActionEnum = z.enum(['create', 'list', 'complete', 'delete', 'update', 'reopen']);
export type SynonymAction = z.infer<typeof SynonymActionEnum>;

const SLOT = '{task}';

const SynonymFileSchema = z.object({
  politePrefixes: z.array(z.string().min(1)),
  actions: z.record(SynonymActionEnum, z.array(z.string().min(1)).min(1)),
  narrationIrregulars: z.array(z.string().min(1)),
});

export type SynonymFile = z.infer<typeof SynonymFileSchema>;

export interface ActionMatch {
  action: SynonymAction;
  pattern: string;
  slot: string | null; // text captured by {task}, null when the pattern has none or it was empty
}

interface CompiledPattern {
  action: SynonymAction;
  pattern: string;
  regex: RegExp;
  literalLength: number;
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function normalizePhrase(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

function compilePattern(action: SynonymAction, pattern: string): CompiledPattern {
  const literals = normalizePhrase(pattern).split(SLOT).map((part) => part.trim());
  let source: string;
  if (literals.length === 1) {
    source = `^${literals[0].split(' ').map(escapeRegex).join('\\s+')}$`;
  } else if (literals.length === 2) {
    const [before, after] = literals.map((part) => part.split(' ').filter(Boolean).map(escapeRegex).join('\\s+'));
    const head = before ? `${before}\\s+` : '';
    const tail = after ? `\\s+${after}` : '';
    source = `^${head}(.+?)${tail}$`;
  } else {
    throw new Error(`Synonym pattern "${pattern}" may contain ${SLOT} at most once.`);
  }
  return {
    action,
    pattern,
    regex: new RegExp(source, 'i'),
    literalLength: literals.join('').length,
  };
}

/**
 * Action synonym table: the single source of truth for which phrasings mean
 * which canonical action. Patterns are anchored at the start of the utterance,
 * so only an imperative reading ever matches; among matching patterns the one
 * with the most literal text wins ("mark {task} as not done" beats "mark {task} done").
 */
export class SynonymTable {
  private readonly compiled: CompiledPattern[];
  private readonly phraseIndex = new Map<string, SynonymAction>();
  private readonly politePrefixes: string[];
  private readonly narrationIrregulars: Set<string>;
  private readonly data: SynonymFile;

  constructor(data: SynonymFile) {
    this.data = data;
    this.compiled = [];
    for (const action of SynonymActionEnum.options) {
      for (const pattern of data.actions[action] ?? []) {
        this.compiled.push(compilePattern(action, pattern));
        const phrase = normalizePhrase(pattern.replace(SLOT, ' '));
        this.indexPhrase(phrase, action);
        this.indexPhrase(phrase.split(' ')[0], action);
      }
      this.indexPhrase(action, action);
    }
    this.compiled.sort((a, b) => b.literalLength - a.literalLength);
    this.politePrefixes = [...data.politePrefixes].map(normalizePhrase).sort((a, b) => b.length - a.length);
    this.narrationIrregulars = new Set(data.narrationIrregulars.map(normalizePhrase));
  }

  public static fromJson(raw: unknown): SynonymTable {
    return new SynonymTable(SynonymFileSchema.parse(raw));
  }

  private static defaultTable: SynonymTable | null = null;

  /** The table shipped in src/config/synonyms.json. */
  public static getDefault(): SynonymTable {
    if (!SynonymTable.defaultTable) {
      SynonymTable.defaultTable = SynonymTable.fromJson(synonymData);
      logger.debug(`[SynonymTable] Loaded ${SynonymTable.defaultTable.compiled.length} action patterns`);
    }
    return SynonymTable.defaultTable;
  }

  public patterns(action: SynonymAction): string[] {
    return [...(this.data.actions[action] ?? [])];
  }

  /**
   * Matches an utterance (already stripped of politeness) against every pattern.
   */
  public match(text: string): ActionMatch | undefined {
    const normalized = text.replace(/\s+/g, ' ').trim();
    for (const candidate of this.compiled) {
      const result = candidate.regex.exec(normalized);
      if (!result) continue;
      const slot = result[1]?.trim();
      return { action: candidate.action, pattern: candidate.pattern, slot: slot ? slot : null };
    }
    return undefined;
  }

  /**
   * Maps a loose action word or phrase ("finish", "mark as done", "get rid of")
   * to its canonical action. Used to normalise free-form model output.
   */
  public canonicalAction(phrase: string): SynonymAction | undefined {
    const normalized = normalizePhrase(phrase).replace(/[^a-z' ]/g, '');
    return this.phraseIndex.get(normalized) ?? this.phraseIndex.get(normalized.split(' ')[0]);
  }

  /**
   * Removes leading politeness and second-person framing ("please", "can you",
   * "I'd like to") and trailing courtesy words, repeatedly.
   */
  public stripPoliteness(text: string): string {
    let current = text.trim();
    let changed = true;
    while (changed) {
      changed = false;
      const lowered = current.toLowerCase();
      for (const prefix of this.politePrefixes) {
        if (lowered === prefix) {
          return '';
        }
        if (lowered.startsWith(prefix) && /[\s,]/.test(lowered.charAt(prefix.length))) {
          current = current.slice(prefix.length).replace(/^[\s,]+/, '');
          changed = true;
          break;
        }
      }
    }
    return current.replace(/[\s,]+(?:please|for me|thanks|thank you)$/i, '').trim();
  }

  /**
   * Recognises first-person past-tense narration ("I completed ...", "I've
   * finished ...", "I did ..."). Returns the narrated action when it maps to one.
   */
  public detectNarration(text: string): { action?: SynonymAction } | undefined {
    const match = /^i(?:'ve|’ve|\s+have|\s+had|\s+just|\s+already|\s+finally)*\s+([a-z]+)\b/i.exec(text.trim());
    if (!match) return undefined;
    const verb = match[1].toLowerCase();
    // "need", "feed" and friends are not past tense
    const regularPast = verb.endsWith('ed') && verb.length > 4 && !verb.endsWith('eed');
    const isPast = regularPast || this.narrationIrregulars.has(verb);
    if (!isPast) return undefined;
    const stem = regularPast ? verb.slice(0, -2) : verb;
    const action = this.canonicalAction(stem) ?? this.canonicalAction(`${stem}e`) ?? this.canonicalAction(verb);
    return { action };
  }

  private indexPhrase(phrase: string, action: SynonymAction): void {
    if (phrase && !this.phraseIndex.has(phrase)) {
      this.phraseIndex.set(phrase, action);
    }
  }
}
