/**
 * MCP Tool Handler
 * Validates tool arguments, runs generation, saves the audio and maps
 * library errors onto MCP error codes without changing their kind.
 */

import { ErrorCode, McpError, type CallToolResult, type Tool } from '@modelcontextprotocol/sdk/types.js';
import { logger } from '@/shared/utils';
import {
  APIError,
  AuthenticationError,
  ConfigurationError,
  ParameterError,
  type SFXController,
  type SoundEffectOptions,
} from '@/modules/sfx';
import type { AudioFileService, SaveAudioOptions } from '@/modules/storage';
import { GENERATE_SFX_TOOL_NAME, generateSfxTool } from '../config/tool.config';

type ToolArguments = Record<string, unknown>;

type SoundEffectGenerator = Pick<SFXController, 'generateSoundEffect'>;
type AudioSink = Pick<AudioFileService, 'save' | 'validateOptions'>;

function invalidParams(message: string): McpError {
  return new McpError(ErrorCode.InvalidParams, message);
}

function readOptionalNumber(args: ToolArguments, key: string): number | undefined {
  const value = args[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value);
  }
  throw invalidParams(`Invalid '${key}' parameter: expected a number.`);
}

function readOptionalString(args: ToolArguments, key: string): string | undefined {
  const value = args[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value;
  }
  throw invalidParams(`Invalid '${key}' parameter: expected a string.`);
}

/**
 * Catalogue an error into an MCP error code
 */
export function toMcpError(error: unknown): McpError {
  if (error instanceof McpError) {
    return error;
  }
  // ConfigurationError extends ParameterError, so it is checked first
  if (error instanceof ConfigurationError) {
    return new McpError(ErrorCode.InternalError, `ElevenLabs API Key configuration error: ${error.message}`);
  }
  if (error instanceof ParameterError) {
    return invalidParams(`ElevenLabs parameter error: ${error.message}`);
  }
  if (error instanceof AuthenticationError) {
    return new McpError(ErrorCode.InternalError, `ElevenLabs API Key configuration error: ${error.describe()}`);
  }
  if (error instanceof APIError) {
    return new McpError(ErrorCode.InternalError, `ElevenLabs API interaction error: ${error.describe()}`);
  }

  const message = error instanceof Error ? error.message : String(error);
  logger.error('Unexpected error during SFX generation', { error: message });
  return new McpError(ErrorCode.InternalError, `An unexpected error occurred: ${message}`);
}

export class ToolHandler {
  constructor(
    private readonly sfx: SoundEffectGenerator,
    private readonly files: AudioSink
  ) {}

  getTools(): Tool[] {
    return [generateSfxTool];
  }

  async handleToolCall(name: string, args: ToolArguments | undefined): Promise<CallToolResult> {
    if (name !== GENERATE_SFX_TOOL_NAME) {
      logger.warn('Unknown tool requested', { tool: name });
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }

    return this.generateSfx(args ?? {});
  }

  private async generateSfx(args: ToolArguments): Promise<CallToolResult> {
    const text = args.text;
    if (typeof text !== 'string' || !text) {
      throw invalidParams("Missing or invalid 'text' parameter.");
    }

    const options: SoundEffectOptions = {
      durationSeconds: readOptionalNumber(args, 'duration_seconds'),
      promptInfluence: readOptionalNumber(args, 'prompt_influence'),
    };
    const saveOptions: SaveAudioOptions = {
      outputDirectory: readOptionalString(args, 'output_directory'),
      outputFilename: readOptionalString(args, 'output_filename'),
    };

    const startTime = Date.now();
    logger.info('Tool call: generate_sfx', {
      preview: text.substring(0, 50),
      durationSeconds: options.durationSeconds,
      promptInfluence: options.promptInfluence,
    });

    try {
      // Reject a bad file name before generating
      this.files.validateOptions(saveOptions);

      const audio = await this.sfx.generateSoundEffect(text, options);
      const filePath = await this.files.save(audio, saveOptions);

      logger.info('Tool call completed: generate_sfx', { path: filePath, durationMs: Date.now() - startTime });
      return {
        content: [{ type: 'text', text: filePath }],
      };
    } catch (error) {
      throw toMcpError(error);
    }
  }
}
