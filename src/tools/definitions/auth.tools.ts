import { ToolBuilder, ParameterTypes, ToolConfig } from '../base/ToolBuilder.js';

export const authToolConfigs: ToolConfig[] = [
  {
    name: 'authenticate',
    description: 'Starts the OAuth2 flow for Gmail and returns the consent URL',
  },
  {
    name: 'complete_authentication',
    description: 'Exchanges the authorization code from the consent page for a stored token',
    parameters: {
      code: ParameterTypes.string('Authorization code shown after granting access'),
    },
    required: ['code'],
  },
];

export const authTools = authToolConfigs.map(config => ToolBuilder.fromConfig(config));
