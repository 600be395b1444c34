import type { Artifact, Table } from '../schemas';
import type { TabularQueryAgent } from '../tabular/tabular-query-agent';
import { createQueryTool } from './query-tool';
import type { BuiltTool } from './retrieval-tool';

export interface TabularToolOptions {
  artifact: Pick<Artifact, 'id' | 'name'>;
  table: Table;
  subAgent: TabularQueryAgent;
}

export function createTabularTool({ artifact, table, subAgent }: TabularToolOptions): BuiltTool {
  const name = `table_${artifact.id}`;
  const description =
    `Answers questions about the spreadsheet ${artifact.name} (${table.rows.length} rows) ` +
    `by filtering and aggregating its rows. Columns: ${table.columns.join(', ')}.`;

  const tool = createQueryTool(name, description, (query) => subAgent.answer(table, query));
  return { name, description, tool };
}
