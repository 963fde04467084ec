import { Tool } from '@modelcontextprotocol/sdk/types.js';
import { authTools } from './auth.tools.js';
import { messageTools } from './message.tools.js';
import { ruleTools } from './rule.tools.js';
import { runTools } from './run.tools.js';

export const toolDefinitions: Tool[] = [...authTools, ...ruleTools, ...runTools, ...messageTools];
