/**
 * Quality Scorer — reproducible heuristic scores for a final answer.
 *
 * Every dimension is a density normalised into [0, 1], so scores compare
 * across answers of different lengths. The scorer holds no state between
 * calls: identical inputs give identical scores.
 */

import { QualityDimension, QualityScores } from '../config/types';
import { DEFAULT_QUALITY_WEIGHTS } from '../config/engine-config';
import { Lexicon } from '../knowledge/vocabulary';
import { cleanLine, countPhrase, isListItem, splitSentences, words } from '../extraction/text';

/** Specific tokens per 100 words at which specificity saturates */
const SPECIFICITY_SATURATION = 15;
/** Share of sentences carrying an action signal at which actionability saturates */
const ACTIONABILITY_SATURATION = 0.5;
/** Connectives per sentence at which strategic value saturates */
const STRATEGY_SATURATION = 0.5;
/** History length beyond which back-references are not expected to grow */
const CONTEXT_HISTORY_CAP = 3;

const DIMENSIONS: readonly QualityDimension[] = [
  'specificity',
  'actionability',
  'strategicValue',
  'contextAwareness',
  'novelty',
];

export interface ScoringHistoryEntry {
  query: string;
  entities: string[];
}

export interface QualityInput {
  answer: string;
  /** Names of entities mentioned in the answer */
  entities: string[];
  /** Prior turns, oldest first; empty on the first turn */
  history: ScoringHistoryEntry[];
  repetitionScore: number;
}

/** Replaceable by a learned model without changing callers. */
export interface QualityScoringStrategy {
  score(input: QualityInput): QualityScores;
}

function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export class HeuristicQualityScorer implements QualityScoringStrategy {
  private readonly imperatives: Set<string>;
  private readonly starters: Set<string>;

  constructor(
    private readonly lexicon: Lexicon,
    private readonly weights: Record<QualityDimension, number> = DEFAULT_QUALITY_WEIGHTS,
  ) {
    this.imperatives = new Set(lexicon.imperativeVerbs.map((v) => v.toLowerCase()));
    this.starters = new Set(lexicon.sentenceStarters.map((v) => v.toLowerCase()));
  }

  score(input: QualityInput): QualityScores {
    const sentences = splitSentences(input.answer);
    const tokens = words(input.answer);

    const dims: Record<QualityDimension, number> = {
      specificity: this.specificity(sentences, tokens.length, input.entities.length),
      actionability: this.actionability(input.answer, sentences),
      strategicValue: this.strategicValue(input.answer, sentences.length),
      contextAwareness: this.contextAwareness(input.answer, input.history.length),
      novelty: clamp01(1 - clamp01(input.repetitionScore)),
    };

    let weighted = 0;
    let total = 0;
    for (const dim of DIMENSIONS) {
      weighted += dims[dim] * this.weights[dim];
      total += this.weights[dim];
    }

    return { ...dims, overall: total > 0 ? clamp01(weighted / total) : 0 };
  }

  private specificity(sentences: string[], wordCount: number, entityCount: number): number {
    if (wordCount === 0) return 0;
    let specific = entityCount;
    for (const sentence of sentences) {
      words(sentence).forEach((word, i) => {
        if (/\d/.test(word)) specific++;
        else if (i > 0 && /^[A-Z]/.test(word) && !this.starters.has(word.toLowerCase())) specific++;
      });
    }
    const per100 = (specific / wordCount) * 100;
    return clamp01(per100 / SPECIFICITY_SATURATION);
  }

  private actionability(answer: string, sentences: string[]): number {
    if (sentences.length === 0) return 0;
    const imperativeSentences = sentences.filter((s) => {
      const first = words(s)[0];
      return first !== undefined && this.imperatives.has(first.toLowerCase());
    }).length;
    const enumerated = answer.split(/\r?\n/).filter((line) => isListItem(line) && cleanLine(line)).length;
    const phrases = this.lexicon.actionPhrases.reduce((n, p) => n + countPhrase(answer, p), 0);

    const signals = imperativeSentences + enumerated + phrases;
    return clamp01(signals / (sentences.length * ACTIONABILITY_SATURATION));
  }

  private strategicValue(answer: string, sentenceCount: number): number {
    if (sentenceCount === 0) return 0;
    const hits = this.lexicon.connectives.reduce((n, c) => n + countPhrase(answer, c), 0);
    return clamp01(hits / (sentenceCount * STRATEGY_SATURATION));
  }

  private contextAwareness(answer: string, historyLength: number): number {
    if (historyLength === 0) return 1;
    const hits = this.lexicon.backReferences.reduce((n, p) => n + countPhrase(answer, p), 0);
    return clamp01(hits / Math.min(historyLength, CONTEXT_HISTORY_CAP));
  }
}
