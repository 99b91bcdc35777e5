import { ResponseStrategy } from '../config/types';
import { MemorySnapshot } from '../memory/types';
import { RegenerationDirective } from '../repetition/regeneration-controller';
import { EntityPlan, STRATEGY_INSTRUCTIONS } from './response-strategy';
import { RetrievedDocument } from './types';

const HISTORY_TURNS = 2;
const HISTORY_ANSWER_CHARS = 200;
const MAX_DOCUMENTS = 8;
const DOCUMENT_CHARS = 1200;
const MAX_EXCLUDED_IN_PROMPT = 10;
const MAX_LONG_TERM_FACTS = 8;

export interface SynthesisContext {
  query: string;
  strategy: ResponseStrategy;
  plan: EntityPlan;
  snapshot: MemorySnapshot;
  documents: RetrievedDocument[];
  goal?: string;
}

function formatDocument(doc: RetrievedDocument, index: number): string {
  const source = typeof doc.sourceMetadata.source === 'string' ? doc.sourceMetadata.source : `document ${index + 1}`;
  const freshness = doc.freshnessTimestamp ? `, updated ${doc.freshnessTimestamp}` : '';
  return `[${index + 1}] (${source}${freshness})\n${doc.content.slice(0, DOCUMENT_CHARS)}`;
}

function directiveSection(directive: RegenerationDirective): string[] {
  switch (directive.kind) {
    case 'none':
      return [];
    case 'exclude':
      return [
        'IMPORTANT: A draft of this answer repeated earlier responses.',
        ...(directive.exclusionList.length > 0
          ? [`Do not mention these entities again: ${directive.exclusionList.join(', ')}.`]
          : []),
        'Bring NEW entities, facts and angles instead.',
      ];
    case 'deepen': {
      const focus = directive.focus.map((f) => {
        const slots = f.slots.map((s) => s.replace(/_/g, ' '));
        return slots.length > 0 ? `${f.entityName} (especially: ${slots.join(', ')})` : f.entityName;
      });
      return [
        'IMPORTANT: A draft of this answer repeated earlier responses.',
        `Stay on ${focus.join(' and ')} but cover what has not been said yet.`,
        ...(directive.exclusionList.length > 0
          ? [`Do not bring up these entities again: ${directive.exclusionList.join(', ')}.`]
          : []),
      ];
    }
  }
}

/**
 * The synthesis prompt: recent history, long-term facts, evidence, the
 * response strategy, the entity plan and, on regeneration, the directive.
 */
export function buildSynthesisPrompt(ctx: SynthesisContext, directive: RegenerationDirective): string {
  const sections: string[][] = [];

  sections.push(['You are an expert assistant helping users with strategic decision-making.']);
  if (ctx.goal) sections.push([`CONVERSATION GOAL: ${ctx.goal}`]);

  const history = ctx.snapshot.shortTerm.slice(-HISTORY_TURNS);
  if (history.length > 0) {
    sections.push([
      'CONVERSATION HISTORY:',
      ...history.map(
        (entry) => `User: ${entry.rewrittenQuery}\nAssistant: ${entry.answerExcerpt.slice(0, HISTORY_ANSWER_CHARS)}...`,
      ),
    ]);
  }

  const facts = ctx.snapshot.longTerm.slice(-MAX_LONG_TERM_FACTS);
  if (facts.length > 0) {
    sections.push(['ALREADY ESTABLISHED:', ...facts.map((f) => `- ${f.text}`)]);
  }

  sections.push([`CURRENT QUESTION: ${ctx.query}`]);

  const docs = ctx.documents.slice(0, MAX_DOCUMENTS);
  sections.push([
    'RELEVANT INFORMATION:',
    docs.length > 0 ? docs.map(formatDocument).join('\n\n') : '(no documents retrieved; rely on general knowledge and say so)',
  ]);

  sections.push([`RESPONSE STRATEGY: ${ctx.strategy.toUpperCase()}`, STRATEGY_INSTRUCTIONS[ctx.strategy]]);

  if (ctx.plan.include.length > 0) {
    sections.push([`Focus specifically on: ${ctx.plan.include.join(', ')}.`]);
  }
  if (ctx.plan.exclude.length > 0 && directive.kind === 'none') {
    sections.push([
      `Avoid repeating information about these already covered entities: ${ctx.plan.exclude
        .slice(0, MAX_EXCLUDED_IN_PROMPT)
        .join(', ')}.`,
    ]);
  }

  const extra = directiveSection(directive);
  if (extra.length > 0) sections.push(extra);

  sections.push([
    'QUALITY REQUIREMENTS:',
    '- Be specific: names, numbers, concrete details.',
    '- Be actionable: clear next steps when relevant.',
    '- Be strategic: explain why, not just what.',
    '- Build on the conversation naturally.',
  ]);

  return sections.map((lines) => lines.join('\n')).join('\n\n');
}
