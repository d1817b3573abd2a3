/**
 * Extraction service backed by an OpenAI chat model through LangChain
 */

import { ChatOpenAI } from '@langchain/openai';
import { HumanMessage, SystemMessage, type BaseMessage } from '@langchain/core/messages';
import type { ExtractionRequest, ExtractionService } from '../../types/services.js';
import { ExtractedTicketSchema } from '../../schemas/ticket.js';
import { ExtractionError, errorMessage, type ExtractionFailureReason } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import {
  EXTRACTION_SYSTEM_PROMPT,
  INFERENCE_SYSTEM_PROMPT,
  buildExtractionPrompt,
  buildInferencePrompt,
} from './prompts.js';

/**
 * The slice of a structured-output runnable this service calls
 */
export interface StructuredTicketModel {
  invoke(messages: BaseMessage[]): Promise<unknown>;
}

export interface OpenAIExtractionOptions {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
  /** Replaces the ChatOpenAI runnable, e.g. in tests */
  structuredModel?: StructuredTicketModel;
}

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';

export function classifyModelFailure(error: unknown): ExtractionFailureReason {
  const message = errorMessage(error);
  const name = error instanceof Error ? error.name : '';

  if (/timeout|timed out|abort/i.test(`${name} ${message}`)) return 'timeout';
  if (/OutputParser|parse|schema|json/i.test(`${name} ${message}`)) return 'malformed';
  return 'unavailable';
}

export class OpenAIExtractionService implements ExtractionService {
  readonly name = 'openai';
  private readonly model: StructuredTicketModel;

  constructor(options: OpenAIExtractionOptions = {}) {
    this.model =
      options.structuredModel ??
      new ChatOpenAI({
        model: options.model ?? DEFAULT_OPENAI_MODEL,
        // Deterministic output for the same alert
        temperature: 0,
        apiKey: options.apiKey,
        timeout: options.timeoutMs,
        // Retries belong to the workflow's inference loop
        maxRetries: 0,
      }).withStructuredOutput(ExtractedTicketSchema, { name: 'ticket_info' });
  }

  async extract(request: ExtractionRequest): Promise<unknown> {
    const inferring = request.partial !== undefined;
    const messages = inferring
      ? [new SystemMessage(INFERENCE_SYSTEM_PROMPT), new HumanMessage(buildInferencePrompt(request))]
      : [new SystemMessage(EXTRACTION_SYSTEM_PROMPT), new HumanMessage(buildExtractionPrompt(request))];

    logger.debug('Invoking extraction model', {
      mode: inferring ? 'fill-missing' : 'extract',
      missingFields: request.missingFields,
    });

    try {
      return await this.model.invoke(messages);
    } catch (error) {
      const reason = classifyModelFailure(error);
      throw new ExtractionError(`OpenAI extraction failed (${reason}): ${errorMessage(error)}`, reason, error);
    }
  }
}
