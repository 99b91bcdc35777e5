/**
 * Regeneration Controller — drives synthesis through the repetition check.
 *
 *   draft → repetition_checked → (regenerating → repetition_checked)* → final
 *
 * A repetitive candidate is regenerated with a directive until it passes or
 * the attempt cap is reached; the last candidate is then final either way.
 */

import { EngineConfig } from '../config/engine-config';
import { EntityCoverageLedger } from '../coverage/entity-coverage-ledger';
import { GenerationFailureError, TurnCancelledError } from '../engine/errors';
import { retryOnce, withTimeout } from '../engine/timeout';
import { Generator } from '../engine/types';
import { ExtractionResult } from '../extraction/entity-extractor';
import { logger } from '../observability/logger';
import { externalCallDuration, regenerations, repetitionLoopsExhausted } from '../observability/metrics';
import { TraceContext, withSpan } from '../observability/trace';
import { PriorAnswer, RepetitionAssessment, RepetitionDetector } from './repetition-detector';

const log = logger.child({ component: 'regeneration-controller' });

export type RegenerationPhase = 'draft' | 'repetition_checked' | 'regenerating' | 'final';

export const PHASE_TRANSITIONS: Record<RegenerationPhase, readonly RegenerationPhase[]> = {
  draft: ['repetition_checked'],
  repetition_checked: ['regenerating', 'final'],
  regenerating: ['repetition_checked'],
  final: [],
};

export type RegenerationDirective =
  | { kind: 'none' }
  /** Avoid what was named recently, apart from what the query is about */
  | { kind: 'exclude'; exclusionList: string[] }
  /** Stay on the query's entities but cover what has not been said about them */
  | { kind: 'deepen'; focus: DeepenFocus[]; exclusionList: string[] };

export interface DeepenFocus {
  entityName: string;
  /** Under-covered slots of the entity */
  slots: string[];
}

export interface RegenerationInput {
  /** Synthesis prompt for a given directive */
  buildPrompt: (directive: RegenerationDirective) => string;
  extract: (answer: string) => ExtractionResult;
  priors: PriorAnswer[];
  /** Entity ids the query is about, if any */
  relevantEntityIds: string[];
  /** Committed coverage, before this turn */
  ledger: EntityCoverageLedger;
  signal?: AbortSignal;
  trace?: TraceContext;
}

export interface RegenerationOutcome {
  answer: string;
  extraction: ExtractionResult;
  assessment: RepetitionAssessment;
  attempts: number;
  regenerated: boolean;
  /** Still repetitive after the last allowed attempt */
  exhausted: boolean;
  phases: RegenerationPhase[];
}

export type RegenerationConfig = Pick<
  EngineConfig,
  'maxRegenerationAttempts' | 'generationTimeoutMs' | 'synthesisTemperature' | 'repetitionLookback'
>;

class PhaseTracker {
  readonly history: RegenerationPhase[] = ['draft'];

  get current(): RegenerationPhase {
    return this.history[this.history.length - 1];
  }

  to(next: RegenerationPhase): void {
    if (!PHASE_TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Invalid regeneration transition ${this.current} → ${next}`);
    }
    this.history.push(next);
  }
}

export class RegenerationController {
  constructor(
    private readonly generator: Generator,
    private readonly detector: RepetitionDetector,
    private readonly config: RegenerationConfig,
  ) {}

  async run(input: RegenerationInput): Promise<RegenerationOutcome> {
    const phases = new PhaseTracker();
    let attempts = 0;
    let directive: RegenerationDirective = { kind: 'none' };

    let answer = await this.generate(input.buildPrompt(directive), directive, input);
    let extraction = input.extract(answer);

    for (;;) {
      const assessment = await this.check(answer, extraction, input);
      phases.to('repetition_checked');

      if (!assessment.isRepetitive || attempts >= this.config.maxRegenerationAttempts) {
        phases.to('final');
        const exhausted = assessment.isRepetitive;
        if (exhausted) {
          repetitionLoopsExhausted.inc();
          log.warn(
            { attempts, repetitionScore: assessment.repetitionScore, overlapRatio: assessment.overlapRatio },
            'Answer still repetitive after max regeneration attempts',
          );
        }
        return {
          answer,
          extraction,
          assessment,
          attempts,
          regenerated: attempts > 0,
          exhausted,
          phases: phases.history,
        };
      }

      attempts++;
      directive = this.chooseDirective(input);
      regenerations.inc({ directive: directive.kind });
      log.debug(
        { attempt: attempts, directive: directive.kind, repetitionScore: assessment.repetitionScore },
        'Regenerating repetitive answer',
      );
      phases.to('regenerating');

      answer = await this.generate(input.buildPrompt(directive), directive, input);
      extraction = input.extract(answer);
    }
  }

  /**
   * Entities the query is about are never excluded. When all of them were
   * covered recently the directive deepens on every one of them; otherwise it
   * excludes the remaining recent entities.
   */
  chooseDirective(input: Pick<RegenerationInput, 'priors' | 'relevantEntityIds' | 'ledger'>): RegenerationDirective {
    const recent = [...input.priors]
      .sort((a, b) => a.turnNumber - b.turnNumber)
      .slice(-this.config.repetitionLookback);
    const recentIds = [...new Set(recent.flatMap((p) => p.entityIds))];
    const nameOf = (id: string): string => input.ledger.get(id)?.entityName ?? id;

    const relevant = [...new Set(input.relevantEntityIds)];
    const exclusionList = recentIds.filter((id) => !relevant.includes(id)).map(nameOf);

    if (relevant.length > 0 && relevant.every((id) => recentIds.includes(id))) {
      return {
        kind: 'deepen',
        focus: relevant.map((id) => ({ entityName: nameOf(id), slots: input.ledger.underCoveredSlots(id) })),
        exclusionList,
      };
    }

    return { kind: 'exclude', exclusionList };
  }

  private async check(
    answer: string,
    extraction: ExtractionResult,
    input: RegenerationInput,
  ): Promise<RepetitionAssessment> {
    const entityIds = extraction.entities.map((e) => e.id);
    const run = () => this.detector.assess(answer, entityIds, input.priors, input.signal);
    return input.trace ? withSpan(input.trace, 'embed', run) : run();
  }

  private async generate(
    prompt: string,
    directive: RegenerationDirective,
    input: RegenerationInput,
  ): Promise<string> {
    const exclusionList = directive.kind === 'none' ? undefined : directive.exclusionList;
    const start = Date.now();

    const call = async (): Promise<string> => {
      try {
        const text = await retryOnce(
          async () => {
            const out = await withTimeout(
              'generation',
              this.config.generationTimeoutMs,
              (signal) =>
                this.generator.generate(prompt, {
                  temperature: this.config.synthesisTemperature,
                  exclusionList,
                  signal,
                  purpose: 'synthesis',
                }),
              input.signal,
            );
            const trimmed = out.trim();
            if (!trimmed) throw new Error('Generator returned an empty answer');
            return trimmed;
          },
          (err) => !(err instanceof TurnCancelledError),
          (err) => log.warn({ err }, 'Generation failed, retrying once'),
        );
        externalCallDuration.observe({ dependency: 'generation', status: 'ok' }, (Date.now() - start) / 1000);
        return text;
      } catch (err) {
        externalCallDuration.observe({ dependency: 'generation', status: 'error' }, (Date.now() - start) / 1000);
        if (err instanceof TurnCancelledError) throw err;
        const message = err instanceof Error ? err.message : String(err);
        throw new GenerationFailureError(`Generation failed: ${message}`, err);
      }
    };

    return input.trace ? withSpan(input.trace, 'generate', call) : call();
  }
}
