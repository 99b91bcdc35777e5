/**
 * Vocabulary — YAML-backed word lists and entity slot definitions.
 *
 * `data/lexicon.yaml` holds cue phrases used by extraction and scoring;
 * `data/entity-slots.yaml` holds the attribute slot vocabulary per entity type.
 * Both are validated on load; a malformed file is a startup error.
 */

import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import Ajv from 'ajv';
import { logger } from '../observability/logger';

// Resolve from project root (2 levels up from dist/knowledge/ or src/knowledge/)
const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
const DATA_DIR = path.resolve(PROJECT_ROOT, 'data');

export interface Lexicon {
  sentenceStarters: string[];
  imperativeVerbs: string[];
  actionPhrases: string[];
  connectives: string[];
  backReferences: string[];
}

export interface EntityTypeDefinition {
  /** Tokens that mark a name as this type (e.g. "Productions" for a company) */
  nameHints: string[];
  /** slot name → cue words implying a fact covers the slot */
  slots: Record<string, string[]>;
}

export interface SlotVocabulary {
  defaultType: string;
  types: Record<string, EntityTypeDefinition>;
}

const ajv = new Ajv({ allErrors: true });

const stringList = { type: 'array', items: { type: 'string' } };

const lexiconSchema = {
  type: 'object',
  properties: {
    sentenceStarters: stringList,
    imperativeVerbs: stringList,
    actionPhrases: stringList,
    connectives: stringList,
    backReferences: stringList,
  },
  required: ['sentenceStarters', 'imperativeVerbs', 'actionPhrases', 'connectives', 'backReferences'],
  additionalProperties: false,
};

const slotVocabularySchema = {
  type: 'object',
  properties: {
    defaultType: { type: 'string' },
    types: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        properties: {
          nameHints: stringList,
          slots: {
            type: 'object',
            additionalProperties: stringList,
            minProperties: 1,
          },
        },
        required: ['nameHints', 'slots'],
        additionalProperties: false,
      },
    },
  },
  required: ['defaultType', 'types'],
  additionalProperties: false,
};

const validateLexicon = ajv.compile<Lexicon>(lexiconSchema);
const validateSlotVocabulary = ajv.compile<SlotVocabulary>(slotVocabularySchema);

function readYaml(filename: string): unknown {
  const filepath = path.join(DATA_DIR, filename);
  const raw = fs.readFileSync(filepath, 'utf-8');
  return yaml.load(raw);
}

export function parseLexicon(data: unknown): Lexicon {
  if (!validateLexicon(data)) {
    const errors = validateLexicon.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ');
    throw new Error(`Invalid lexicon: ${errors}`);
  }
  return data;
}

export function parseSlotVocabulary(data: unknown): SlotVocabulary {
  if (!validateSlotVocabulary(data)) {
    const errors = validateSlotVocabulary.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ');
    throw new Error(`Invalid slot vocabulary: ${errors}`);
  }
  if (!data.types[data.defaultType]) {
    throw new Error(`Invalid slot vocabulary: defaultType "${data.defaultType}" has no definition`);
  }
  return data;
}

let cachedLexicon: Lexicon | null = null;
let cachedSlots: SlotVocabulary | null = null;

export function loadLexicon(): Lexicon {
  if (!cachedLexicon) {
    cachedLexicon = parseLexicon(readYaml('lexicon.yaml'));
    logger.debug({ connectives: cachedLexicon.connectives.length }, 'Loaded lexicon');
  }
  return cachedLexicon;
}

export function loadSlotVocabulary(): SlotVocabulary {
  if (!cachedSlots) {
    cachedSlots = parseSlotVocabulary(readYaml('entity-slots.yaml'));
    logger.debug({ types: Object.keys(cachedSlots.types) }, 'Loaded entity slot vocabulary');
  }
  return cachedSlots;
}

/** Slot names for an entity type, falling back to the default type. */
export function slotsForType(vocabulary: SlotVocabulary, entityType: string): string[] {
  const def = vocabulary.types[entityType] ?? vocabulary.types[vocabulary.defaultType];
  return def ? Object.keys(def.slots) : [];
}
