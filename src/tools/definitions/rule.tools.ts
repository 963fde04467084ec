import { ToolBuilder, ParameterTypes, ToolConfig } from '../base/ToolBuilder.js';

export const ruleToolConfigs: ToolConfig[] = [
  {
    name: 'list_rules',
    description: 'Lists the retention rules with their labels, ages and actions',
  },
  {
    name: 'add_rule',
    description: 'Adds a retention rule. Labels are optional; a rule without labels stays inactive',
    parameters: {
      retention: ParameterTypes.retention(),
      labels: ParameterTypes.array({ type: 'string' }, 'Mailbox labels the rule governs'),
      action: ParameterTypes.action(),
      generate_label: ParameterTypes.boolean(
        'Mark trashed messages with a processed label so later runs skip them',
        true
      ),
      id: ParameterTypes.integer('Explicit rule id (defaults to the next free id)', 1),
    },
    required: ['retention'],
  },
  {
    name: 'remove_rule',
    description: 'Removes a retention rule, by id or by one of its labels',
    parameters: {
      rule_id: ParameterTypes.ruleId(),
      label: ParameterTypes.string('Remove the rule that governs this label'),
    },
  },
  {
    name: 'add_rule_label',
    description: 'Adds a mailbox label to a retention rule',
    parameters: {
      rule_id: ParameterTypes.ruleId(),
      label: ParameterTypes.string('Label name'),
    },
    required: ['rule_id', 'label'],
  },
  {
    name: 'remove_rule_label',
    description: 'Removes a mailbox label from a retention rule',
    parameters: {
      rule_id: ParameterTypes.ruleId(),
      label: ParameterTypes.string('Label name'),
    },
    required: ['rule_id', 'label'],
  },
  {
    name: 'set_rule_action',
    description: 'Changes whether a rule trashes or permanently deletes messages',
    parameters: {
      rule_id: ParameterTypes.ruleId(),
      action: ParameterTypes.action(),
    },
    required: ['rule_id', 'action'],
  },
];

export const ruleTools = ruleToolConfigs.map(config => ToolBuilder.fromConfig(config));
