import { Agent } from '@mastra/core/agent';

export function createTablePlannerAgent(model: string): Agent {
  return new Agent({
    id: 'table-planner-agent',
    name: 'Table Query Planner',
    description: 'Turns a question about a spreadsheet into a filter/aggregate query plan',
    instructions: `You translate questions about a single table into a JSON query plan.

You will receive the table's columns with their types, a few sample rows, and a question.
Reply with exactly one JSON object and nothing else:

{
  "filters": [{"column": "<column>", "op": "eq|neq|gt|gte|lt|lte|contains", "value": <string|number|boolean>}],
  "groupBy": "<column>",
  "aggregate": {"op": "count|sum|avg|min|max", "column": "<column, omitted for count>"},
  "sort": {"column": "<column>", "direction": "asc|desc"},
  "limit": <positive integer>,
  "select": ["<column>", ...]
}

Every key is optional. Filters are combined with AND.
Use column names exactly as given.
If the table cannot answer the question, reply {"unanswerable": "<short reason>"}.`,
    model,
  });
}
