import type { Callbacks } from '@langchain/core/callbacks/manager';
import { HumanMessage, SystemMessage, type BaseMessage, type MessageContent } from '@langchain/core/messages';
import type { Config } from '../config';
import { ProviderError } from '../errors';
import { SEGMENTATION_SYSTEM_PROMPT, buildSegmentationPrompt } from '../prompts/segmentation-prompt';
import { createLangfuseHandler, createOpenRouterLLM } from './llm';

/**
 * Anything that can propose segment boundaries for a document.
 * Returns the raw model output; parsing and validation belong to the chunker.
 */
export interface SegmentationService {
  segment(text: string, signal?: AbortSignal): Promise<string>;
}

/** The slice of a LangChain chat model the segmenter needs */
export interface ChatModel {
  invoke(
    messages: BaseMessage[],
    options?: { signal?: AbortSignal; callbacks?: Callbacks }
  ): Promise<{ content: MessageContent }>;
}

function contentToText(content: MessageContent): string {
  if (typeof content === 'string') return content;
  return content
    .map(part => ('text' in part && typeof part.text === 'string' ? part.text : ''))
    .join('');
}

export class LlmSegmentationService implements SegmentationService {
  constructor(
    private readonly llm: ChatModel,
    private readonly maxSegments = 0,
    private readonly callbacks?: Callbacks
  ) {}

  async segment(text: string, signal?: AbortSignal): Promise<string> {
    const response = await this.llm.invoke(
      [new SystemMessage(SEGMENTATION_SYSTEM_PROMPT), new HumanMessage(buildSegmentationPrompt(text, this.maxSegments))],
      { signal, callbacks: this.callbacks }
    );

    const output = contentToText(response.content).trim();
    if (!output) {
      throw new ProviderError('Empty response from segmentation model');
    }
    return output;
  }
}

export function createSegmentationService(config: Config): LlmSegmentationService {
  const llm = createOpenRouterLLM(config, {
    model: config.chunking.segmentationModel,
    temperature: 0,
    maxTokens: 2048,
  });
  const langfuse = createLangfuseHandler(config, { tags: ['segmentation'] });
  return new LlmSegmentationService(llm, config.chunking.maxChunksPerArticle, langfuse ? [langfuse] : undefined);
}
