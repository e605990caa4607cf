/**
 * Consolidated report of the analyzed items.
 *
 * Builds the rows and totals each report mode shows. Rendering (tables, PDF)
 * is left to the caller.
 */

import { PricingError } from '@/lib/errors';
import { createLogger, type Logger } from '@/lib/logger';
import { METHOD_LABELS } from '../constants';
import { applyRounding } from '../domain/rounding';
import type { Money } from '../domain/types';
import { formatCurrencyBRL, formatReportDate } from '../utils/formatting';
import type { AnalysisMode, ContractAssessment, ItemRecord } from './itemAnalysis';

export type ComparisonDirection = 'more_expensive' | 'cheaper' | 'equal';

export interface ReportRow {
  readonly item_num: number;
  readonly process_number: string;
  readonly description: string;
  readonly unit: string;
  readonly method: string;
  readonly unit_market_value: Money;
  readonly total_market_value: Money;
  readonly unit_contracted: Money;
  readonly total_contracted: Money;
  readonly contract_assessment: ContractAssessment | null;
  readonly unit_best_price: Money;
  readonly total_best_price: Money;
  readonly best_proposal: string;
}

interface ReportBase {
  readonly process_number: string;
  readonly generated_at: string;
  readonly rows: ReadonlyArray<ReportRow>;
  readonly total_market: Money;
  readonly headline: string;
  /** Item numbers with research problems and no justification yet. */
  readonly pending_justifications: ReadonlyArray<number>;
}

export interface StandardReport extends ReportBase {
  readonly mode: 'standard';
}

export interface ContractExtensionReport extends ReportBase {
  readonly mode: 'contract_extension';
  readonly total_contracted: Money;
  /** Contracted minus market. */
  readonly difference: Money;
  readonly direction: ComparisonDirection;
}

export interface PriceMapReport extends ReportBase {
  readonly mode: 'price_map';
  readonly total_best_price: Money;
  /** Market minus best prices. */
  readonly difference: Money;
  /** How the best prices compare with the research result. */
  readonly direction: ComparisonDirection;
}

export type ConsolidatedReport = StandardReport | ContractExtensionReport | PriceMapReport;

export interface ReportOptions {
  readonly generatedAt?: Date;
  readonly decimal_places?: number;
  readonly use_nbr_rounding?: boolean;
  readonly logger?: Logger;
}

const DIRECTION_LABELS: Record<ComparisonDirection, string> = {
  more_expensive: 'more expensive',
  cheaper: 'cheaper',
  equal: 'equal',
};

export function renumberItems<T extends { readonly item_num: number }>(items: ReadonlyArray<T>): T[] {
  return items.map((item, i) => ({ ...item, item_num: i + 1 }));
}

export function directionOf(difference: Money): ComparisonDirection {
  if (difference > 0) return 'more_expensive';
  if (difference < 0) return 'cheaper';
  return 'equal';
}

function toRow(record: ItemRecord, processNumber: string): ReportRow {
  const best = record.best_price;
  return {
    item_num: record.item_num,
    process_number: processNumber,
    description: record.description,
    unit: record.unit,
    method: METHOD_LABELS[record.final_method],
    unit_market_value: record.unit_market_value,
    total_market_value: record.total_market_value,
    unit_contracted: record.contract?.unit_contracted ?? 0,
    total_contracted: record.contract?.total_contracted ?? 0,
    contract_assessment: record.contract?.assessment ?? null,
    unit_best_price: best?.unit_best_price ?? 0,
    total_best_price: best?.total_best_price ?? 0,
    best_proposal: best ? `SOURCE: ${best.source_name || '—'} | LOCATOR: ${best.locator || '—'}` : '',
  };
}

export function buildConsolidatedReport(
  items: ReadonlyArray<ItemRecord>,
  processNumber: string,
  mode: AnalysisMode,
  options: ReportOptions = {}
): ConsolidatedReport {
  const process_number = processNumber.trim();
  if (process_number === '') {
    throw new PricingError('VALIDATION_FAILED', 'A process number is required for the report');
  }

  const logger = options.logger ?? createLogger('consolidation');
  const round = (value: number) =>
    applyRounding(value, options.decimal_places, options.use_nbr_rounding);

  const records = renumberItems(items);
  const rows = records.map(r => toRow(r, process_number));
  const total = (pick: (row: ReportRow) => Money) => round(rows.reduce((acc, r) => acc + pick(r), 0));
  const total_market = total(r => r.total_market_value);

  const base = {
    process_number,
    generated_at: formatReportDate(options.generatedAt ?? new Date()),
    rows,
    total_market,
    pending_justifications: records
      .filter(r => r.problems.length > 0 && r.justification.trim() === '')
      .map(r => r.item_num),
  };

  let report: ConsolidatedReport;
  switch (mode) {
    case 'contract_extension': {
      const total_contracted = total(r => r.total_contracted);
      const difference = round(total_contracted - total_market);
      const direction = directionOf(difference);
      report = {
        ...base,
        mode,
        total_contracted,
        difference,
        direction,
        headline:
          `Total obtained in the market research: ${formatCurrencyBRL(total_market)}. ` +
          `Total contracted: ${formatCurrencyBRL(total_contracted)}. ` +
          `Difference: ${formatCurrencyBRL(Math.abs(difference))} (${DIRECTION_LABELS[direction]}).`,
      };
      break;
    }
    case 'price_map': {
      const total_best_price = total(r => r.total_best_price);
      const difference = round(total_market - total_best_price);
      // best prices below the research result are the cheaper side
      const direction = directionOf(-difference);
      const comparison =
        direction === 'equal'
          ? 'equal to'
          : `${formatCurrencyBRL(Math.abs(difference))} ${DIRECTION_LABELS[direction]} than`;
      report = {
        ...base,
        mode,
        total_best_price,
        difference,
        direction,
        headline:
          `Total obtained in the market research: ${formatCurrencyBRL(total_market)} | ` +
          `Total of the best prices: ${formatCurrencyBRL(total_best_price)} | ` +
          `The best prices are ${comparison} the research result`,
      };
      break;
    }
    default:
      report = {
        ...base,
        mode: 'standard',
        headline: `Total obtained in the market research: ${formatCurrencyBRL(total_market)}`,
      };
  }

  logger.info({
    op: 'build_report',
    status: base.pending_justifications.length > 0 ? 'needs_justification' : 'ok',
    meta: { mode, items: rows.length, total_market },
  });

  return report;
}
