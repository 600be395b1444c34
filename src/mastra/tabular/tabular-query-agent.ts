import { describeError } from '../lib/errors';
import { extractJsonObject } from '../lib/json';
import type { Logger } from '../lib/logger';
import { err, ok, type Result } from '../lib/result';
import { withTimeout } from '../lib/timeout';
import type { LanguageModel } from '../llm/language-model';
import { plannerResponseSchema, type CellValue, type PlannerResponse, type Table } from '../schemas';
import { describeResult, executePlan, formatValue, toNumber } from './execute-plan';

const SAMPLE_ROWS = 3;

export function columnType(table: Table, index: number): 'number' | 'boolean' | 'text' | 'empty' {
  const values = table.rows.map((row) => row[index]).filter((value): value is Exclude<CellValue, null> => value !== null && value !== '');
  if (values.length === 0) return 'empty';
  if (values.every((value) => typeof value === 'boolean')) return 'boolean';
  if (values.every((value) => toNumber(value) !== undefined)) return 'number';
  return 'text';
}

export function plannerPrompt(table: Table, question: string): string {
  const columns = table.columns.map((column, i) => `- ${column} (${columnType(table, i)})`).join('\n');
  const sample = table.rows
    .slice(0, SAMPLE_ROWS)
    .map((row) => row.map(formatValue).join(' | '))
    .join('\n');

  return `Table: ${table.name} (${table.rows.length} rows)
Columns:
${columns}

Sample rows:
${table.columns.join(' | ')}
${sample}

Question: ${question}`;
}

export function parsePlannerResponse(text: string): Result<PlannerResponse, string> {
  const json = extractJsonObject(text);
  if (!json.ok) return json;
  const parsed = plannerResponseSchema.safeParse(json.value);
  if (!parsed.success) {
    return err(parsed.error.issues.map((issue) => `${issue.path.join('.') || 'plan'}: ${issue.message}`).join('; '));
  }
  return ok(parsed.data);
}

export interface TabularQueryAgentOptions {
  model: LanguageModel;
  maxParseRetries: number;
  timeoutMs: number;
  maxRows: number;
  logger?: Logger;
}

/**
 * Answers a question about one table: asks the planner model for a query plan, runs it
 * locally, and renders the outcome as text. Every failure comes back as an explanation
 * string, never as a thrown error.
 */
export class TabularQueryAgent {
  constructor(private readonly options: TabularQueryAgentOptions) {}

  async answer(table: Table, question: string): Promise<string> {
    try {
      return await this.planAndRun(table, question);
    } catch (error) {
      this.options.logger?.warn('Table query failed', { table: table.name, error: describeError(error) });
      return `Could not query ${table.name}: ${describeError(error)}`;
    }
  }

  private async planAndRun(table: Table, question: string): Promise<string> {
    const { model, maxParseRetries, timeoutMs, maxRows, logger } = this.options;
    const basePrompt = plannerPrompt(table, question);
    let prompt = basePrompt;
    let problem = '';

    for (let attempt = 0; attempt <= maxParseRetries; attempt++) {
      const raw = await withTimeout((signal) => model.complete(prompt, { signal }), timeoutMs, 'Table query planning');

      const parsed = parsePlannerResponse(raw);
      if (parsed.ok) {
        if ('unanswerable' in parsed.value) {
          return `The table ${table.name} cannot answer this: ${parsed.value.unanswerable}`;
        }
        const outcome = executePlan(table, parsed.value);
        if (outcome.ok) {
          logger?.debug('Executed table query plan', { table: table.name, plan: parsed.value });
          return describeResult(outcome.value, maxRows);
        }
        problem = outcome.error;
      } else {
        problem = parsed.error;
      }

      logger?.debug('Rejected table query plan', { table: table.name, attempt, problem });
      prompt = `${basePrompt}

Your previous reply could not be used (${problem}). Reply with a single valid JSON query plan.`;
    }

    return `Could not turn the question into a query over ${table.name}: ${problem}`;
  }
}
