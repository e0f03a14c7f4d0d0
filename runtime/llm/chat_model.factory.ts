import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { ChatOpenAI } from "@langchain/openai";
import type { ModelConfig } from "./model.config";

export function createChatModel(config: ModelConfig): BaseChatModel {
  return new ChatOpenAI({
    model: config.model,
    temperature: config.temperature,
    apiKey: config.apiKey,
    streaming: true,
    configuration: config.baseUrl ? { baseURL: config.baseUrl } : undefined,
  });
}
