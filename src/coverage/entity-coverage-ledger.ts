/**
 * Entity Coverage Ledger — per-conversation record of which entities have
 * been discussed, in which turns, and which of their attribute slots the
 * answers have covered.
 *
 * Records are only ever extended. The ledger is cloned for staging: a turn
 * registers its mentions on a clone, and only the touched records are
 * handed to persistence with the turn bundle.
 */

import { EntityCoverage, EntityRef, Fact } from '../config/types';
import { SlotVocabulary, slotsForType } from '../knowledge/vocabulary';

function union(existing: string[], additions: string[]): string[] {
  const next = [...existing];
  for (const item of additions) {
    if (!next.includes(item)) next.push(item);
  }
  return next;
}

export class EntityCoverageLedger {
  private readonly records: Map<string, EntityCoverage>;
  private readonly touched = new Set<string>();

  constructor(
    private readonly conversationId: string,
    private readonly vocabulary: SlotVocabulary,
    existing: EntityCoverage[] = [],
  ) {
    this.records = new Map(existing.map((r) => [r.entityId, r]));
  }

  /**
   * Record one mention of `entity` in `turnNumber` with the facts stated
   * about it. Facts about other entities are ignored.
   */
  registerMention(entity: EntityRef, turnNumber: number, facts: Fact[], now = Date.now()): EntityCoverage {
    const own = facts.filter((f) => f.entityId === entity.id);
    const validSlots = slotsForType(this.vocabulary, entity.type);
    const slots = own.flatMap((f) => f.slots).filter((s) => validSlots.includes(s));
    const current = this.records.get(entity.id);

    // Records are replaced, never mutated, so clones can share them
    const next: EntityCoverage = current
      ? {
          ...current,
          firstMentionedTurn: Math.min(current.firstMentionedTurn, turnNumber),
          lastMentionedTurn: Math.max(current.lastMentionedTurn, turnNumber),
          mentionCount: current.mentionCount + 1,
          factsCovered: union(current.factsCovered, own.map((f) => f.id)),
          attributesCovered: union(current.attributesCovered, slots),
          updatedAt: now,
        }
      : {
          conversationId: this.conversationId,
          entityId: entity.id,
          entityName: entity.name,
          entityType: entity.type,
          firstMentionedTurn: turnNumber,
          lastMentionedTurn: turnNumber,
          mentionCount: 1,
          factsCovered: union([], own.map((f) => f.id)),
          attributesCovered: union([], slots),
          updatedAt: now,
        };

    this.records.set(entity.id, next);
    this.touched.add(entity.id);
    return next;
  }

  get(entityId: string): EntityCoverage | undefined {
    return this.records.get(entityId);
  }

  /** Share of the type's slots covered so far; 0 for an unknown entity. */
  depthScore(entityId: string): number {
    const record = this.records.get(entityId);
    if (!record) return 0;
    const slots = slotsForType(this.vocabulary, record.entityType);
    if (slots.length === 0) return 0;
    return record.attributesCovered.length / slots.length;
  }

  /** Slots of the entity's type not yet covered, in vocabulary order. */
  underCoveredSlots(entityId: string): string[] {
    const record = this.records.get(entityId);
    if (!record) return [];
    return slotsForType(this.vocabulary, record.entityType).filter(
      (slot) => !record.attributesCovered.includes(slot),
    );
  }

  all(): EntityCoverage[] {
    return [...this.records.values()];
  }

  /** Records registered on this instance since it was created. */
  changed(): EntityCoverage[] {
    return [...this.touched]
      .map((id) => this.records.get(id))
      .filter((r): r is EntityCoverage => r !== undefined);
  }

  clone(): EntityCoverageLedger {
    return new EntityCoverageLedger(this.conversationId, this.vocabulary, this.all());
  }
}
