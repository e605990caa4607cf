/**
 * Batch research by source
 *
 * Items and sources are registered first, each source's prices are entered
 * for every item, then all items are analyzed at once.
 */

import type { Logger } from '@/lib/logger';
import { isFiniteNumber } from '../domain/guards';
import type { EvaluationContext, Money, Quotation, SourceKind } from '../domain/types';
import { renumberItems } from './consolidation';
import {
  analyzeItem,
  finalizeItem,
  type AnalysisMode,
  type ItemAnalysis,
  type ItemDescriptor,
  type ItemRecord,
} from './itemAnalysis';

export interface CatalogItem extends ItemDescriptor {
  readonly id: string;
}

export interface CatalogSource {
  readonly id: string;
  readonly name: string;
  readonly kind: SourceKind;
}

export interface Proposal {
  readonly item_id: string;
  readonly source_id: string;
  readonly price: Money;
  readonly locator: string;
}

export interface SourcePriceEntry {
  readonly item_id: string;
  readonly price?: Money | null;
  readonly locator?: string | null;
}

export interface ResearchCatalog {
  readonly items: ReadonlyArray<CatalogItem>;
  readonly sources: ReadonlyArray<CatalogSource>;
  readonly proposals: ReadonlyArray<Proposal>;
}

export interface BatchOptions {
  readonly mode: AnalysisMode;
  readonly context: EvaluationContext;
  readonly use_minimum_price?: boolean;
  readonly logger?: Logger;
}

export interface BatchPreviewEntry {
  readonly item_id: string;
  readonly analysis: ItemAnalysis;
}

/**
 * Replace the prices one source gave for the listed items.
 * An entry without a price withdraws that source's proposal for the item.
 */
export function recordSourcePrices(
  proposals: ReadonlyArray<Proposal>,
  sourceId: string,
  entries: ReadonlyArray<SourcePriceEntry>
): Proposal[] {
  const touched = new Set(entries.map(e => e.item_id));
  const kept = proposals.filter(p => !(p.source_id === sourceId && touched.has(p.item_id)));

  const added = entries.flatMap((e): Proposal[] =>
    isFiniteNumber(e.price)
      ? [{ item_id: e.item_id, source_id: sourceId, price: e.price, locator: (e.locator ?? '').trim() }]
      : []
  );

  return [...kept, ...added];
}

/** Drop proposals whose source no longer exists. */
export function pruneOrphanProposals(
  proposals: ReadonlyArray<Proposal>,
  sources: ReadonlyArray<CatalogSource>
): Proposal[] {
  const ids = new Set(sources.map(s => s.id));
  return proposals.filter(p => ids.has(p.source_id));
}

export function quotationsForItem(catalog: ResearchCatalog, itemId: string): Quotation[] {
  const sourcesById = new Map(catalog.sources.map(s => [s.id, s]));

  return catalog.proposals.flatMap((p): Quotation[] => {
    if (p.item_id !== itemId) return [];
    const source = sourcesById.get(p.source_id);
    if (!source) return [];
    return [{ source_name: source.name, source_kind: source.kind, locator: p.locator, price: p.price }];
  });
}

/**
 * Analyze every item that received at least one price, in catalog order.
 */
export function buildBatchPreview(catalog: ResearchCatalog, options: BatchOptions): BatchPreviewEntry[] {
  return catalog.items.flatMap((item): BatchPreviewEntry[] => {
    const quotations = quotationsForItem(catalog, item.id);
    if (!quotations.some(q => isFiniteNumber(q.price))) return [];

    const analysis = analyzeItem(
      {
        mode: options.mode,
        item,
        quotations,
        context: options.context,
        use_minimum_price: options.use_minimum_price,
      },
      { logger: options.logger }
    );
    return [{ item_id: item.id, analysis }];
  });
}

/**
 * Turn a preview into report records, replacing or appending to the
 * existing ones. Justifications may be given per item id; missing ones stay
 * pending in the consolidated report.
 */
export function confirmBatch(
  existing: ReadonlyArray<ItemRecord>,
  preview: ReadonlyArray<BatchPreviewEntry>,
  options: { replace: boolean; justifications?: Readonly<Record<string, string>> }
): ItemRecord[] {
  const created = preview.flatMap(({ item_id, analysis }): ItemRecord[] =>
    analysis.priced
      ? [
          finalizeItem(analysis, options.justifications?.[item_id] ?? '', 0, {
            allowPendingJustification: true,
          }),
        ]
      : []
  );

  return renumberItems(options.replace ? created : [...existing, ...created]);
}
