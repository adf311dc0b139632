import { createAnthropic } from '@ai-sdk/anthropic';
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  generateText,
  type ModelMessage,
  stepCountIs,
  type ToolSet,
} from 'ai';
import { PinoLogger } from 'nestjs-pino';

export interface LlmGenerateOptions {
  system: string;
  messages: ModelMessage[];
  tools?: ToolSet;
  maxSteps?: number;
  maxTokens?: number;
}

export interface LlmResponse {
  text: string;
  finishReason: string;
  stepCount: number;
  toolNames: string[];
}

@Injectable()
export class LlmService {
  private readonly model: ReturnType<ReturnType<typeof createAnthropic>>;

  constructor(
    private readonly logger: PinoLogger,
    private readonly configService: ConfigService,
  ) {
    this.logger.setContext(LlmService.name);
    const anthropicProvider = createAnthropic({
      apiKey: this.configService.get<string>('anthropic.apiKey'),
    });
    this.model = anthropicProvider(
      this.configService.get<string>(
        'anthropic.model',
        'claude-sonnet-4-20250514',
      ),
    );
  }

  /**
   * Generate a complete response, running tool calls for up to `maxSteps`.
   */
  async generate(options: LlmGenerateOptions): Promise<LlmResponse> {
    const { system, messages, tools, maxSteps = 5, maxTokens = 1024 } = options;

    try {
      const result = await generateText({
        model: this.model,
        maxOutputTokens: maxTokens,
        system,
        messages,
        tools,
        stopWhen: stepCountIs(maxSteps),
      });

      const toolNames = result.steps
        .flatMap(step => step.toolCalls)
        .map(call => call.toolName);

      this.logger.debug(
        {
          finishReason: result.finishReason,
          stepCount: result.steps.length,
          toolNames,
        },
        'Generation complete',
      );

      return {
        text: result.text,
        finishReason: result.finishReason,
        stepCount: result.steps.length,
        toolNames,
      };
    } catch (error) {
      this.logger.error({ err: error }, 'Error calling Anthropic API');
      throw error;
    }
  }
}
