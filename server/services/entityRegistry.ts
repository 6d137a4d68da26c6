import { z } from 'zod';
import type { DocumentStore } from '../data/documentStore.js';
import { compareDocuments, type SortSpec } from '../data/documentFilter.js';
import type { EntityDocument } from '../data/documents.js';
import { MARKET_TIMEZONE } from '../config.js';
import { currentDateKey, isDateKey } from '../lib/dateUtils.js';
import { DuplicateEntityError, EntityNotFoundError } from '../lib/errors.js';

export const PRIORITY_ORDER: ReadonlyArray<SortSpec<EntityDocument>> = [
  { field: 'priorityWeight', direction: 'desc' },
  { field: 'id', direction: 'asc' },
];

export const EntityInputSchema = z.object({
  id: z
    .string()
    .trim()
    .min(1)
    .max(20)
    .transform((value) => value.toUpperCase()),
  displayName: z.string().trim().optional(),
  priorityWeight: z.number().finite().nonnegative(),
  isActive: z.boolean().optional(),
  addedOn: z.string().refine(isDateKey, { message: 'addedOn must be a YYYY-MM-DD date' }).optional(),
});

export type EntityInput = z.input<typeof EntityInputSchema>;

export interface RegistryStatistics {
  total: number;
  active: number;
  inactive: number;
  neverAnalyzed: number;
  priorityWeight: { min: number; max: number; sum: number; avg: number } | null;
}

export interface EntityRegistryOptions {
  now?: () => Date;
  timeZone?: string;
}

/**
 * Tracked instruments and their per-entity analysis progress marker.
 * Entities are deactivated, never deleted.
 */
export class EntityRegistry {
  private readonly store: DocumentStore;
  private readonly now: () => Date;
  private readonly timeZone: string;

  constructor(store: DocumentStore, options: EntityRegistryOptions = {}) {
    this.store = store;
    this.now = options.now ?? (() => new Date());
    this.timeZone = options.timeZone ?? MARKET_TIMEZONE;
  }

  async get(id: string): Promise<EntityDocument | null> {
    return this.store.get('entities', id);
  }

  private async require(id: string): Promise<EntityDocument> {
    const entity = await this.get(id);
    if (!entity) throw new EntityNotFoundError(id);
    return entity;
  }

  private async save(entity: EntityDocument): Promise<EntityDocument> {
    const next = { ...entity, updatedAt: this.now().toISOString() };
    await this.store.upsert('entities', next.id, next);
    return next;
  }

  async listActive(): Promise<EntityDocument[]> {
    return this.store.query('entities', { isActive: true }, { sort: PRIORITY_ORDER });
  }

  /** Active entities not yet analyzed for `date`, highest priority first. */
  async listBacklog(date: string): Promise<EntityDocument[]> {
    const [never, behind] = await Promise.all([
      this.store.query('entities', { isActive: true, lastAnalyzedDate: null }),
      this.store.query('entities', { isActive: true, lastAnalyzedDate: { $lt: date } }),
    ]);
    return [...never, ...behind].sort((a, b) => compareDocuments(a, b, PRIORITY_ORDER));
  }

  /**
   * Advances the entity's analysis marker. The marker never moves backwards:
   * a date at or before the stored one is a no-op and returns false.
   */
  async markAnalyzed(id: string, date: string): Promise<boolean> {
    const entity = await this.require(id);
    if (entity.lastAnalyzedDate !== null && date <= entity.lastAnalyzedDate) {
      return false;
    }
    await this.save({ ...entity, lastAnalyzedDate: date });
    return true;
  }

  private fromInput(input: EntityInput, existing: EntityDocument | null): EntityDocument {
    const parsed = EntityInputSchema.parse(input);
    return {
      id: parsed.id,
      displayName: parsed.displayName ?? existing?.displayName ?? parsed.id,
      priorityWeight: parsed.priorityWeight,
      isActive: parsed.isActive ?? existing?.isActive ?? true,
      addedOn: existing?.addedOn ?? parsed.addedOn ?? currentDateKey(this.now(), this.timeZone),
      lastAnalyzedDate: existing?.lastAnalyzedDate ?? null,
      updatedAt: existing?.updatedAt ?? '',
    };
  }

  async add(input: EntityInput): Promise<EntityDocument> {
    const id = EntityInputSchema.shape.id.parse(input.id);
    if (await this.get(id)) {
      throw new DuplicateEntityError(id);
    }
    return this.save(this.fromInput(input, null));
  }

  /** Seeds or refreshes entities; existing analysis markers and onboarding dates are kept. */
  async upsertMany(inputs: ReadonlyArray<EntityInput>): Promise<{ inserted: number; updated: number }> {
    let inserted = 0;
    let updated = 0;
    for (const input of inputs) {
      const id = EntityInputSchema.shape.id.parse(input.id);
      const existing = await this.get(id);
      await this.save(this.fromInput(input, existing));
      if (existing) updated += 1;
      else inserted += 1;
    }
    return { inserted, updated };
  }

  async deactivate(id: string): Promise<EntityDocument> {
    const entity = await this.require(id);
    return entity.isActive ? this.save({ ...entity, isActive: false }) : entity;
  }

  async activate(id: string): Promise<EntityDocument> {
    const entity = await this.require(id);
    return entity.isActive ? entity : this.save({ ...entity, isActive: true });
  }

  async updatePriorityWeight(id: string, priorityWeight: number): Promise<EntityDocument> {
    const weight = EntityInputSchema.shape.priorityWeight.parse(priorityWeight);
    const entity = await this.require(id);
    return this.save({ ...entity, priorityWeight: weight });
  }

  async getStatistics(): Promise<RegistryStatistics> {
    const all = await this.store.query('entities');
    const active = all.filter((entity) => entity.isActive);
    const weights = active.map((entity) => entity.priorityWeight);
    const sum = weights.reduce((acc, w) => acc + w, 0);
    return {
      total: all.length,
      active: active.length,
      inactive: all.length - active.length,
      neverAnalyzed: active.filter((entity) => entity.lastAnalyzedDate === null).length,
      priorityWeight:
        weights.length > 0
          ? {
              min: Math.min(...weights),
              max: Math.max(...weights),
              sum,
              avg: Math.round((sum / weights.length) * 100) / 100,
            }
          : null,
    };
  }
}
