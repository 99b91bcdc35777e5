/**
 * Entity Extractor — pulls named entities and the facts stated about them
 * out of an answer.
 *
 * Entities are runs of capitalised words ("Platform A", "Sarah Chen",
 * "Bank of America"). A fact is a sentence that mentions an entity; its slots
 * come from the cue words of the entity type's slot vocabulary.
 */

import { createHash } from 'crypto';
import { EntityRef, Fact } from '../config/types';
import { Lexicon, SlotVocabulary } from '../knowledge/vocabulary';
import { containsPhrase, slugify, splitSentences } from './text';

const TOKEN = /[A-Za-z0-9][A-Za-z0-9&'’.-]*|[^\sA-Za-z0-9]/g;
const CONNECTORS = new Set(['of', '&', 'de']);
const PERSON_TOKEN = /^[A-Z][a-z]+(?:[-'’][A-Za-z]+)*$/;

export interface ExtractionResult {
  entities: EntityRef[];
  facts: Fact[];
}

interface RunToken {
  word: string;
  position: number;
}

function normalizeToken(token: string): string {
  let word = token.replace(/['’]s$/, '');
  if (word.endsWith('.') && word.indexOf('.') === word.length - 1) {
    word = word.slice(0, -1);
  }
  return word;
}

function isCapitalized(word: string): boolean {
  return /^[A-Z]/.test(word);
}

function isAllCaps(word: string): boolean {
  return /^[A-Z0-9&]+$/.test(word) && (word.match(/[A-Z]/g)?.length ?? 0) >= 2;
}

export function factId(entityId: string, sentence: string): string {
  const normalized = sentence.toLowerCase().replace(/\s+/g, ' ').trim();
  return createHash('sha1').update(`${entityId}|${normalized}`).digest('hex').slice(0, 12);
}

export class EntityExtractor {
  private readonly skipWords: Set<string>;

  constructor(
    lexicon: Lexicon,
    private readonly vocabulary: SlotVocabulary,
  ) {
    this.skipWords = new Set(
      [...lexicon.sentenceStarters, ...lexicon.imperativeVerbs].map((w) => w.toLowerCase()),
    );
  }

  extract(text: string): ExtractionResult {
    const entities = this.extractEntities(text);
    return { entities, facts: this.extractFacts(text, entities) };
  }

  /** Entities in order of first appearance, deduplicated by id. */
  extractEntities(text: string): EntityRef[] {
    const sentences = splitSentences(text).map((s) => s.match(TOKEN) ?? []);
    const midSentence = new Set<string>();

    for (const tokens of sentences) {
      let position = 0;
      for (const token of tokens) {
        if (!/^[A-Za-z0-9]/.test(token)) continue;
        const word = normalizeToken(token);
        if (position > 0 && isCapitalized(word)) midSentence.add(word);
        position++;
      }
    }

    const found = new Map<string, EntityRef>();
    for (const tokens of sentences) {
      for (const run of this.capitalizedRuns(tokens)) {
        const entity = this.toEntity(run, midSentence);
        if (entity && !found.has(entity.id)) found.set(entity.id, entity);
      }
    }
    return [...found.values()];
  }

  /** Type of an already extracted name, judged from its words alone. */
  typeOfName(name: string): string {
    return this.resolveType(name.split(/\s+/));
  }

  /** Entity types a text asks about by their plain name ("other platforms"). */
  typesNamedIn(text: string): string[] {
    return Object.keys(this.vocabulary.types).filter((type) =>
      [type, `${type}s`, type.replace(/y$/, 'ies')].some((form) => containsPhrase(text, form)),
    );
  }

  /** One fact per (entity, sentence) pair mentioning it. */
  extractFacts(text: string, entities: EntityRef[]): Fact[] {
    const facts = new Map<string, Fact>();
    for (const sentence of splitSentences(text)) {
      for (const entity of entities) {
        if (!containsPhrase(sentence, entity.name)) continue;
        const id = factId(entity.id, sentence);
        if (facts.has(id)) continue;
        facts.set(id, {
          id,
          entityId: entity.id,
          text: sentence,
          slots: this.slotsFor(entity.type, sentence),
        });
      }
    }
    return [...facts.values()];
  }

  private slotsFor(entityType: string, sentence: string): string[] {
    const def = this.vocabulary.types[entityType] ?? this.vocabulary.types[this.vocabulary.defaultType];
    if (!def) return [];
    return Object.entries(def.slots)
      .filter(([, cues]) => cues.some((cue) => containsPhrase(sentence, cue)))
      .map(([slot]) => slot);
  }

  private capitalizedRuns(tokens: string[]): RunToken[][] {
    const runs: RunToken[][] = [];
    let current: RunToken[] = [];
    let position = 0;

    const flush = (): void => {
      if (current.length > 0) runs.push(current);
      current = [];
    };

    tokens.forEach((token, i) => {
      if (!/^[A-Za-z0-9]/.test(token)) {
        flush();
        return;
      }
      const word = normalizeToken(token);
      const next = tokens[i + 1];

      if (isCapitalized(word)) {
        current.push({ word, position });
        // "Netflix's" or a sentence-final period closes the name
        if (word !== token) flush();
      } else if (
        current.length > 0 &&
        CONNECTORS.has(word) &&
        next !== undefined &&
        isCapitalized(next)
      ) {
        current.push({ word, position });
      } else {
        flush();
      }
      position++;
    });
    flush();
    return runs;
  }

  private toEntity(run: RunToken[], midSentence: Set<string>): EntityRef | null {
    let start = 0;
    while (start < run.length && this.skipWords.has(run[start].word.toLowerCase())) start++;
    const tokens = run.slice(start);
    if (tokens.length === 0) return null;

    if (tokens.length === 1) {
      const { word, position } = tokens[0];
      if (word.length === 1) return null;
      if (position === 0 && !midSentence.has(word) && !isAllCaps(word)) return null;
    }

    const words = tokens.map((t) => t.word);
    const name = words.join(' ');
    const id = slugify(name);
    if (!id) return null;
    return { id, name, type: this.resolveType(words) };
  }

  private resolveType(words: string[]): string {
    for (const [type, def] of Object.entries(this.vocabulary.types)) {
      if (def.nameHints.some((hint) => words.includes(hint))) return type;
    }
    const personLike = words.length >= 2 && words.length <= 3 && words.every((w) => PERSON_TOKEN.test(w));
    if (personLike && this.vocabulary.types.person) return 'person';
    return this.vocabulary.defaultType;
  }
}
