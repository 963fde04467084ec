import { ToolBuilder, ParameterTypes, ToolConfig } from '../base/ToolBuilder.js';

export const messageToolConfigs: ToolConfig[] = [
  {
    name: 'list_messages',
    description:
      'Lists the subject and date of messages matching a search query and labels, or the messages a rule would select on its next run',
    parameters: {
      query: ParameterTypes.string('Gmail search query, e.g. "from:shop.example older_than:1y"'),
      labels: ParameterTypes.array({ type: 'string' }, 'Only messages carrying all of these labels'),
      rule_id: ParameterTypes.integer('List what this rule would select instead of a query', 1),
      max_pages: ParameterTypes.integer('Number of result pages to read', 1, 1),
    },
  },
];

export const messageTools = messageToolConfigs.map(config => ToolBuilder.fromConfig(config));
