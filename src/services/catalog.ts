/**
 * Parts Catalog Service
 * Loads part name / price / weight from Supabase when configured, otherwise
 * from the JSON catalog file. Calculations hold one immutable snapshot for
 * their whole run; a reload builds a new snapshot and swaps the reference.
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { CatalogEntry, PartsCatalog, ResolvedPart } from '../types';
import { getSupabaseClient, isDatabaseConfigured } from './database';
import { settings } from './settings';

export type CatalogSource = 'database' | 'file' | 'fixture' | 'empty';

export class CatalogLoadError extends Error {
  constructor(message: string, readonly source: CatalogSource) {
    super(message);
    this.name = 'CatalogLoadError';
  }
}

const catalogRowSchema = z.object({
  part_no: z.string().trim().min(1),
  name: z.string().default(''),
  unit_price_usd: z.coerce.number().nonnegative().default(0),
  unit_weight_kg: z.coerce.number().nonnegative().default(0)
});

/**
 * Validate raw rows; invalid rows are skipped and counted
 */
export function parseCatalogRows(rows: unknown): { entries: CatalogEntry[]; skipped: number } {
  if (!Array.isArray(rows)) {
    throw new CatalogLoadError('Catalog data must be an array of parts', 'file');
  }

  const entries: CatalogEntry[] = [];
  let skipped = 0;

  for (const row of rows) {
    const parsed = catalogRowSchema.safeParse(row);
    if (parsed.success) {
      entries.push({ ...parsed.data, name: parsed.data.name || parsed.data.part_no });
    } else {
      skipped++;
    }
  }

  return { entries, skipped };
}

// ============================================================================
// SNAPSHOT
// ============================================================================

export class CatalogSnapshot implements PartsCatalog {
  private constructor(
    private readonly entries: ReadonlyMap<string, Readonly<CatalogEntry>>,
    readonly source: CatalogSource
  ) {}

  static fromEntries(entries: CatalogEntry[], source: CatalogSource): CatalogSnapshot {
    const map = new Map<string, Readonly<CatalogEntry>>();
    for (const entry of entries) {
      map.set(entry.part_no, Object.freeze({ ...entry }));
    }
    return new CatalogSnapshot(map, source);
  }

  static empty(): CatalogSnapshot {
    return CatalogSnapshot.fromEntries([], 'empty');
  }

  get size(): number {
    return this.entries.size;
  }

  get(partNo: string): CatalogEntry | undefined {
    const entry = this.entries.get(partNo);
    return entry ? { ...entry } : undefined;
  }

  /** Unknown parts resolve to zero price / weight, never throw */
  resolve(partNo: string): ResolvedPart {
    const entry = this.entries.get(partNo);
    if (!entry) {
      return { part_no: partNo, name: partNo, unit_price_usd: 0, unit_weight_kg: 0, found: false };
    }
    return { ...entry, found: true };
  }

  list(skip = 0, limit = 100): CatalogEntry[] {
    return [...this.entries.values()]
      .sort((a, b) => a.part_no.localeCompare(b.part_no))
      .slice(skip, skip + limit)
      .map(entry => ({ ...entry }));
  }
}

// ============================================================================
// LOADERS
// ============================================================================

export function resolveCatalogPath(file: string): string {
  return path.isAbsolute(file) ? file : path.resolve(__dirname, '..', '..', file);
}

export async function loadCatalogFromFile(file: string): Promise<CatalogSnapshot> {
  const fullPath = resolveCatalogPath(file);
  let raw: string;
  try {
    raw = await readFile(fullPath, 'utf-8');
  } catch (err) {
    throw new CatalogLoadError(`Cannot read catalog file ${fullPath}: ${err instanceof Error ? err.message : err}`, 'file');
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new CatalogLoadError(`Catalog file ${fullPath} is not valid JSON`, 'file');
  }

  const { entries, skipped } = parseCatalogRows(data);
  if (skipped > 0) {
    console.warn(`⚠️ Skipped ${skipped} invalid catalog row(s) in ${fullPath}`);
  }
  return CatalogSnapshot.fromEntries(entries, 'file');
}

export async function loadCatalogFromDatabase(table: string): Promise<CatalogSnapshot> {
  const client = getSupabaseClient();
  const { data, error } = await client
    .from(table)
    .select('part_no, name, unit_price_usd, unit_weight_kg');

  if (error) {
    throw new CatalogLoadError(`Error fetching catalog: ${error.message}`, 'database');
  }

  const { entries, skipped } = parseCatalogRows(data ?? []);
  if (skipped > 0) {
    console.warn(`⚠️ Skipped ${skipped} invalid catalog row(s) from ${table}`);
  }
  return CatalogSnapshot.fromEntries(entries, 'database');
}

// ============================================================================
// STORE
// ============================================================================

export interface CatalogStoreOptions {
  file: string;
  table: string;
  useDatabase: boolean;
}

export class CatalogStore {
  private snapshot: CatalogSnapshot;

  constructor(
    private readonly options: CatalogStoreOptions = {
      file: settings.catalog_file,
      table: settings.catalog_table,
      useDatabase: isDatabaseConfigured()
    },
    initial: CatalogSnapshot = CatalogSnapshot.empty()
  ) {
    this.snapshot = initial;
  }

  /** The snapshot a calculation should use from start to finish */
  current(): CatalogSnapshot {
    return this.snapshot;
  }

  /**
   * Load a fresh snapshot (database first when configured, then the file)
   * and swap it in. On failure the previous snapshot stays in place.
   */
  async reload(): Promise<CatalogSnapshot> {
    let next: CatalogSnapshot | null = null;

    if (this.options.useDatabase) {
      try {
        next = await loadCatalogFromDatabase(this.options.table);
      } catch (err) {
        console.error('❌ Database catalog load failed:', err instanceof Error ? err.message : err);
        console.warn('⚠️ Falling back to catalog file');
      }
    }

    if (!next) {
      next = await loadCatalogFromFile(this.options.file);
    }

    this.snapshot = next;
    console.log(`✅ Loaded ${next.size} catalog parts from ${next.source}`);
    return next;
  }
}
