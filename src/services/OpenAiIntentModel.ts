// src/services/OpenAiIntentModel.ts
import OpenAI from 'openai';
import { logger } from '../utils/logger.js';
import { type MessageData } from '../types/index.js';
import { type IntentModel } from './IntentClassifier.js';

export interface OpenAiIntentModelOptions {
  apiKey: string;
  baseURL?: string;
  model: string;
}

const SYSTEM_PROMPT = `You classify one message sent to a todo-list assistant.
Reply with a single JSON object and nothing else:
{"action": "create" | "list" | "complete" | "delete" | "update" | "reopen" | "none",
 "title": string | null,            // create: the task title
 "description": string | null,      // create: optional details
 "task_reference": string | null,   // complete/delete/update/reopen: the words naming the task, verbatim
 "new_title": string | null,        // update: new title
 "new_description": string | null,  // update: new description
 "filter": "all" | "pending" | "completed" | null}  // list
Use "none" when the message is not a request to act on tasks, including when the
user merely reports something they already did. Never invent task ids.`;

/**
 * IntentModel backed by an OpenAI-compatible chat completions endpoint. Only
 * consulted for utterances the synonym table does not recognise.
 */
export class OpenAiIntentModel implements IntentModel {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(options: OpenAiIntentModelOptions) {
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL, maxRetries: 0 });
    this.model = options.model;
  }

  public async classify(utterance: string, history: MessageData[], signal: AbortSignal): Promise<string> {
    const messages: OpenAI.ChatCompletionMessageParam[] = [{ role: 'system', content: SYSTEM_PROMPT }];
    for (const message of history) {
      // Turn records are internal bookkeeping, not dialogue.
      if (message.role === 'user') messages.push({ role: 'user', content: message.content });
      else if (message.role === 'assistant') messages.push({ role: 'assistant', content: message.content });
    }
    messages.push({ role: 'user', content: utterance });

    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages,
        temperature: 0,
        response_format: { type: 'json_object' },
      },
      { signal }
    );

    const content = response.choices[0]?.message.content ?? '';
    logger.debug({ model: this.model, usage: response.usage }, '[OpenAiIntentModel] classification response');
    return content;
  }
}
