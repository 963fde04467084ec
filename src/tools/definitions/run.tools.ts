import { ToolBuilder, ParameterTypes, ToolConfig } from '../base/ToolBuilder.js';

const selectionParameters = {
  skip_trash: ParameterTypes.boolean('Leave out rules whose action is trash', false),
  skip_delete: ParameterTypes.boolean('Leave out rules whose action is delete', false),
  rule_ids: ParameterTypes.ruleIds(),
};

export const runToolConfigs: ToolConfig[] = [
  {
    name: 'preview_rule_queries',
    description: 'Shows the search query each selected rule and label would run, in execution order',
    parameters: selectionParameters,
  },
  {
    name: 'run_rules',
    description:
      'Applies the retention rules to the mailbox. Without execute=true this is a dry run that only reports what would be disposed of',
    parameters: {
      ...selectionParameters,
      execute: ParameterTypes.boolean('Actually trash or delete messages', false),
    },
  },
  {
    name: 'list_mailbox_labels',
    description: 'Lists the labels that exist in the mailbox',
  },
];

export const runTools = runToolConfigs.map(config => ToolBuilder.fromConfig(config));
