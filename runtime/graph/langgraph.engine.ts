import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { HumanMessage } from "@langchain/core/messages";
import type { StructuredToolInterface } from "@langchain/core/tools";
import { MemorySaver } from "@langchain/langgraph";
import type {
  EngineFactory,
  EngineInvokeOptions,
  ReasoningEngine,
} from "../../src/session/session.types";
import type { RawEngineEvent } from "../../src/stream/stream.types";
import { buildChatGraph, type CompiledChatGraph } from "./chat.graph";

export interface LangGraphEngineDeps {
  readonly model: BaseChatModel;
  readonly tools?: readonly StructuredToolInterface[];
  readonly systemPrompt?: string;
  readonly recursionLimit: number;
}

/** One compiled graph plus its own in-memory checkpointer per session. */
export class LangGraphEngine implements ReasoningEngine {
  private readonly app: CompiledChatGraph;
  private readonly threadId: string;
  private readonly recursionLimit: number;

  constructor(app: CompiledChatGraph, threadId: string, recursionLimit: number) {
    this.app = app;
    this.threadId = threadId;
    this.recursionLimit = recursionLimit;
  }

  async *invoke(message: string, options: EngineInvokeOptions): AsyncGenerator<RawEngineEvent> {
    const stream = this.app.streamEvents(
      { messages: [new HumanMessage(message)] },
      {
        version: "v2",
        configurable: { thread_id: this.threadId },
        recursionLimit: this.recursionLimit,
        signal: options.signal,
      }
    );
    for await (const event of stream) {
      yield event;
    }
  }
}

export function createLangGraphEngineFactory(deps: LangGraphEngineDeps): EngineFactory {
  return (sessionId) => {
    const app = buildChatGraph({
      model: deps.model,
      tools: deps.tools ?? [],
      systemPrompt: deps.systemPrompt,
      checkpointer: new MemorySaver(),
    });
    return new LangGraphEngine(app, sessionId, deps.recursionLimit);
  };
}
