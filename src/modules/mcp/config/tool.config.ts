/**
 * MCP Tool Configuration
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';

export const SERVER_INFO = {
  name: 'sfx-mcp',
  version: '0.1.0',
} as const;

export const SERVER_INSTRUCTIONS = 'MCP Server for generating sound effects using the ElevenLabs API.';

export const GENERATE_SFX_TOOL_NAME = 'generate_sfx';

export const generateSfxTool: Tool = {
  name: GENERATE_SFX_TOOL_NAME,
  description:
    'Generates a sound effect based on a text prompt using the ElevenLabs API and returns the path to the audio file.',
  inputSchema: {
    type: 'object',
    properties: {
      text: {
        type: 'string',
        description: 'The text prompt for the sound effect.',
      },
      duration_seconds: {
        type: 'number',
        description: 'Optional duration of the sound effect in seconds (0.5 to 22.0).',
      },
      prompt_influence: {
        type: 'number',
        description: 'Optional influence of the prompt on the generation (0.0 to 1.0).',
      },
      output_directory: {
        type: 'string',
        description:
          "Optional: The directory path where the sound effect should be saved. Can be absolute or relative to the server's CWD. Defaults to a temporary directory if not provided.",
      },
      output_filename: {
        type: 'string',
        description:
          'Optional: The desired filename for the sound effect (including extension). Defaults to a unique system-generated name if not provided. Versioning (e.g., filename_v2.mp3) is applied if the file already exists.',
      },
    },
    required: ['text'],
  },
};
