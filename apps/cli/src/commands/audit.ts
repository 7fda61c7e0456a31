/**
 * nowcast audit command
 *
 * Run the local data-quality checks on a JSON table and optionally write
 * a cleaned copy. No request is sent to the service.
 */

import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import {
  auditData,
  cleanData,
  type AggregationName,
  type AuditCheckId,
  type AuditResult,
  type DataTable,
  type Row,
} from '@nowcast/forecasting';
import { createLogger } from '@nowcast/core';
import { readTable, writeJson, writeTable } from './shared.js';

export interface AuditCommandOptions {
  freq: string | number;
  idCol?: string;
  timeCol?: string;
  targetCol?: string;
  start?: string;
  end?: string;
  clean?: boolean;
  cleanCaseSpecific?: boolean;
  agg?: Record<string, AggregationName>;
  output?: string;
  json?: boolean;
  verbose?: boolean;
}

const CHECK_TITLES: Record<AuditCheckId, string> = {
  D001: 'Duplicate rows',
  D002: 'Missing timestamps',
  F001: 'Categorical columns',
  V001: 'Negative values',
  V002: 'Leading zeros',
};

const CHECK_IDS: readonly AuditCheckId[] = ['D001', 'D002', 'F001', 'V001', 'V002'];

const AGGREGATIONS: readonly AggregationName[] = ['sum', 'mean', 'min', 'max', 'first', 'last', 'median', 'count'];

/**
 * Parse `--agg y=mean,price=sum`
 */
export function parseAggregations(value: string): Record<string, AggregationName> {
  const result: Record<string, AggregationName> = {};
  for (const pair of value.split(',')) {
    const [column, name] = pair.split('=').map((part) => part.trim());
    const aggregation = AGGREGATIONS.find((a) => a === name);
    if (!column || aggregation === undefined) {
      throw new InvalidArgumentError(
        `Expected column=aggregation pairs with one of ${AGGREGATIONS.join(', ')}, got "${pair}".`
      );
    }
    result[column] = aggregation;
  }
  return result;
}

interface SerializedAudit {
  allPass: boolean;
  failures: Partial<Record<AuditCheckId, Row[] | null>>;
  caseSpecific: Partial<Record<AuditCheckId, Row[]>>;
}

function serializeAudit(audit: AuditResult): SerializedAudit {
  const failures: SerializedAudit['failures'] = {};
  for (const [id, table] of auditEntries(audit.failures)) {
    failures[id] = table ? table.toRecords() : null;
  }
  const caseSpecific: SerializedAudit['caseSpecific'] = {};
  for (const [id, table] of auditEntries(audit.caseSpecific)) {
    if (table) caseSpecific[id] = table.toRecords();
  }
  return { allPass: audit.allPass, failures, caseSpecific };
}

function auditEntries(
  findings: Partial<Record<AuditCheckId, DataTable | null>>
): Array<[AuditCheckId, DataTable | null]> {
  const entries: Array<[AuditCheckId, DataTable | null]> = [];
  for (const id of CHECK_IDS) {
    const table = findings[id];
    if (table !== undefined) entries.push([id, table]);
  }
  return entries;
}

function formatReport(audit: AuditResult): string {
  const lines: string[] = [];
  lines.push('');
  lines.push(chalk.bold('  Data Audit'));
  lines.push(chalk.dim('  ─────────────────────────────────────────────────────'));

  for (const [id, table] of auditEntries(audit.failures)) {
    const detail = table === null ? 'not checked' : findingSummary(id, table);
    lines.push(`  ${chalk.red('✗')} ${id} ${CHECK_TITLES[id]} ${chalk.dim(`(${detail})`)}`);
  }
  for (const [id, table] of auditEntries(audit.caseSpecific)) {
    lines.push(`  ${chalk.yellow('~')} ${id} ${CHECK_TITLES[id]} ${chalk.dim(`(${table ? findingSummary(id, table) : ''})`)}`);
  }

  lines.push('');
  lines.push(audit.allPass ? `  ${chalk.green('✓')} All checks passed` : `  ${chalk.red('Issues found')}`);
  lines.push('');
  return lines.join('\n');
}

function findingSummary(id: AuditCheckId, table: DataTable): string {
  return id === 'F001' ? table.columns.join(', ') : `${table.rowCount} row(s)`;
}

/**
 * Exits with code 1 when failing checks remain
 */
export async function auditCommand(input: string, options: AuditCommandOptions): Promise<void> {
  if (options.clean && !options.output && !options.json) {
    throw new InvalidArgumentError('--clean needs --output or --json for the cleaned rows');
  }
  const logger = createLogger('nowcast-cli', {
    minSeverity: options.verbose ? 'DEBUG' : 'WARNING',
    prettyPrint: false,
  });
  const auditOptions = {
    freq: options.freq,
    idCol: options.idCol,
    timeCol: options.timeCol,
    targetCol: options.targetCol,
    start: options.start,
    end: options.end,
    logger,
  };

  const data = readTable(input);
  let audit = auditData(data, auditOptions);
  let cleaned: DataTable | undefined;

  if (options.clean) {
    const result = cleanData(data, audit, {
      ...auditOptions,
      cleanCaseSpecific: options.cleanCaseSpecific,
      aggDict: options.agg,
    });
    cleaned = result.data;
    audit = result.audit;
  }

  if (options.json) {
    writeJson(
      cleaned ? { audit: serializeAudit(audit), data: cleaned.toRecords() } : { audit: serializeAudit(audit) },
      options.output
    );
  } else {
    console.log(formatReport(audit));
    if (cleaned) writeTable(cleaned, options.output);
  }

  if (Object.keys(audit.failures).length > 0) {
    process.exit(1);
  }
}
