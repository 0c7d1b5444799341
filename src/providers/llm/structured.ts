/**
 * Structured Output
 *
 * Three ways to get schema-valid JSON out of a model, most reliable first:
 *
 *   structured-output  native json_schema response format
 *   json-mode          valid JSON guaranteed, schema given in the prompt
 *   prompt-based       plain text searched for a JSON object
 *
 * A provider tries the tiers it supports in order. Validation failures
 * are retried with the error fed back; other failures move on to the
 * next tier.
 */

import type { LanguageModelV3 } from '@ai-sdk/provider';
import { generateText, Output, zodSchema } from 'ai';
import { z } from 'zod';
import type { CompletionOptions, Message } from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export type StrategyName = 'structured-output' | 'json-mode' | 'prompt-based';

export interface ProviderCapabilities {
  provider: string;
  /** Native json_schema response format */
  supportsStructuredOutputs: boolean;
  /** response_format: json_object */
  supportsJsonMode: boolean;
}

export interface StrategyExecutorOptions {
  /** Retries per tier before falling back (default: 2) */
  maxRetriesPerStrategy?: number;
  /** Only this tier */
  forceStrategy?: StrategyName;
}

interface Strategy {
  readonly name: StrategyName;
  isSupported(capabilities: ProviderCapabilities): boolean;
  execute<T>(
    model: LanguageModelV3,
    messages: Message[],
    schema: z.ZodType<T>,
    options?: CompletionOptions
  ): Promise<T>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Helpers
// ═══════════════════════════════════════════════════════════════════════════════

function settings(options?: CompletionOptions) {
  return {
    maxOutputTokens: options?.maxTokens,
    temperature: options?.temperature,
    abortSignal: options?.abortSignal
  };
}

async function describeSchema<T>(schema: z.ZodType<T>): Promise<string> {
  const jsonSchema = await Promise.resolve(zodSchema(schema).jsonSchema);
  return JSON.stringify(jsonSchema, null, 2);
}

/** Append an instruction to the last message */
function withInstruction(messages: Message[], instruction: string): Message[] {
  const last = messages.at(-1);
  if (!last) throw new Error('No messages provided');
  return [...messages.slice(0, -1), { role: last.role, content: `${last.content}\n\n${instruction}` }];
}

/**
 * JSON inside a model answer: a fenced block, the first balanced object,
 * or an array, in that order. Falls back to the trimmed text.
 */
export function extractJSON(text: string): string {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced?.[1]) return fenced[1].trim();

  const start = text.indexOf('{');
  if (start >= 0) {
    let depth = 0;
    for (let i = start; i < text.length; i++) {
      if (text[i] === '{') depth++;
      else if (text[i] === '}' && --depth === 0) return text.slice(start, i + 1);
    }
  }

  const array = text.match(/\[[\s\S]*\]/);
  return array ? array[0] : text.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// Strategies
// ═══════════════════════════════════════════════════════════════════════════════

const structuredOutput: Strategy = {
  name: 'structured-output',
  isSupported: (capabilities) => capabilities.supportsStructuredOutputs,
  async execute<T>(model: LanguageModelV3, messages: Message[], schema: z.ZodType<T>, options?: CompletionOptions) {
    const { output } = await generateText({
      model,
      messages,
      output: Output.object({ schema: zodSchema(schema) }),
      ...settings(options)
    });
    // Re-validate for the caller's static type
    return schema.parse(output);
  }
};

const jsonMode: Strategy = {
  name: 'json-mode',
  isSupported: (capabilities) => capabilities.supportsJsonMode,
  async execute<T>(model: LanguageModelV3, messages: Message[], schema: z.ZodType<T>, options?: CompletionOptions) {
    const description = await describeSchema(schema);
    const { output } = await generateText({
      model,
      messages: withInstruction(messages, `Respond with a JSON object matching this JSON Schema:\n${description}`),
      output: Output.json(),
      ...settings(options)
    });
    return schema.parse(output);
  }
};

const promptBased: Strategy = {
  name: 'prompt-based',
  isSupported: () => true,
  async execute<T>(model: LanguageModelV3, messages: Message[], schema: z.ZodType<T>, options?: CompletionOptions) {
    const description = await describeSchema(schema);
    const { text } = await generateText({
      model,
      messages: withInstruction(
        messages,
        `Respond ONLY with a JSON object matching this JSON Schema:\n${description}\n\n` +
          'No other text, markdown or explanation.'
      ),
      ...settings(options)
    });

    let parsed: unknown;
    try {
      parsed = JSON.parse(extractJSON(text));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to parse JSON answer: ${reason}. Last 200 chars: ${text.slice(-200)}`);
    }
    return schema.parse(parsed);
  }
};

const STRATEGIES: readonly Strategy[] = [structuredOutput, jsonMode, promptBased];

// ═══════════════════════════════════════════════════════════════════════════════
// Capabilities & Execution
// ═══════════════════════════════════════════════════════════════════════════════

export function getDefaultCapabilities(provider: string): ProviderCapabilities {
  switch (provider) {
    case 'openai':
    case 'openai-compatible':
      return { provider, supportsStructuredOutputs: true, supportsJsonMode: true };
    case 'google':
    case 'ollama':
      return { provider, supportsStructuredOutputs: false, supportsJsonMode: true };
    default:
      // anthropic has neither
      return { provider, supportsStructuredOutputs: false, supportsJsonMode: false };
  }
}

/** Tier names a provider will try, in order */
export function strategiesFor(capabilities: ProviderCapabilities): StrategyName[] {
  return STRATEGIES.filter((s) => s.isSupported(capabilities)).map((s) => s.name);
}

function isValidationError(error: Error): boolean {
  return error instanceof z.ZodError || /validation|parse/i.test(error.message);
}

/**
 * @throws Error naming every tier's failure when all of them fail
 */
export async function executeWithStrategies<T>(
  model: LanguageModelV3,
  messages: Message[],
  schema: z.ZodType<T>,
  capabilities: ProviderCapabilities,
  options?: CompletionOptions,
  executorOptions: StrategyExecutorOptions = {}
): Promise<T> {
  const { maxRetriesPerStrategy = 2, forceStrategy } = executorOptions;

  let strategies = STRATEGIES.filter((s) => s.isSupported(capabilities));
  if (forceStrategy) {
    strategies = strategies.filter((s) => s.name === forceStrategy);
    if (strategies.length === 0) {
      throw new Error(`Strategy "${forceStrategy}" is not supported for provider "${capabilities.provider}"`);
    }
  }

  const failures: string[] = [];
  for (const strategy of strategies) {
    let attemptMessages = messages;

    for (let attempt = 0; attempt <= maxRetriesPerStrategy; attempt++) {
      try {
        return await strategy.execute(model, attemptMessages, schema, options);
      } catch (caught) {
        const error = caught instanceof Error ? caught : new Error(String(caught));
        if (options?.abortSignal?.aborted) throw error;

        if (attempt === maxRetriesPerStrategy || !isValidationError(error)) {
          failures.push(`${strategy.name}: ${error.message}`);
          break;
        }
        attemptMessages = [
          ...messages,
          {
            role: 'user',
            content: `The previous response was invalid: ${error.message}. Answer again in the expected format.`
          }
        ];
      }
    }
  }

  throw new Error(
    `All structured output strategies failed for provider "${capabilities.provider}":\n${failures.join('\n')}`
  );
}
