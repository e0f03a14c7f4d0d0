import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import type { BaseLanguageModelInput } from "@langchain/core/language_models/base";
import { isAIMessage, SystemMessage, type BaseMessage } from "@langchain/core/messages";
import type { Runnable } from "@langchain/core/runnables";
import type { StructuredToolInterface } from "@langchain/core/tools";
import { END, MessagesAnnotation, StateGraph, type BaseCheckpointSaver } from "@langchain/langgraph";
import { ToolNode } from "@langchain/langgraph/prebuilt";

export type ChatGraphState = typeof MessagesAnnotation.State;

export interface ChatGraphDeps {
  readonly model: BaseChatModel;
  readonly tools: readonly StructuredToolInterface[];
  readonly systemPrompt?: string;
  readonly checkpointer: BaseCheckpointSaver;
}

export const AGENT_NODE = "agent";
export const TOOLS_NODE = "tools";

function bindModel(
  model: BaseChatModel,
  tools: readonly StructuredToolInterface[]
): Runnable<BaseLanguageModelInput, BaseMessage> {
  if (tools.length === 0 || typeof model.bindTools !== "function") {
    return model;
  }
  return model.bindTools([...tools]);
}

export function routeAfterAgent(state: ChatGraphState): "tools" | "end" {
  const last = state.messages[state.messages.length - 1];
  if (last && isAIMessage(last) && (last.tool_calls?.length ?? 0) > 0) {
    return "tools";
  }
  return "end";
}

/**
 * agent -> (tools -> agent)* -> END. The checkpointer keeps the conversation
 * per `thread_id`, so one graph instance serves one session.
 */
export function buildChatGraph(deps: ChatGraphDeps) {
  const runnable = bindModel(deps.model, deps.tools);
  const systemPrompt = deps.systemPrompt;

  const graph = new StateGraph(MessagesAnnotation)
    .addNode(AGENT_NODE, async (state: ChatGraphState) => {
      const prompt = systemPrompt
        ? [new SystemMessage(systemPrompt), ...state.messages]
        : state.messages;
      const response = await runnable.invoke(prompt);
      return { messages: [response] };
    })
    .addNode(TOOLS_NODE, new ToolNode([...deps.tools]));

  graph.setEntryPoint(AGENT_NODE);
  graph.addConditionalEdges(AGENT_NODE, routeAfterAgent, {
    tools: TOOLS_NODE,
    end: END,
  });
  graph.addEdge(TOOLS_NODE, AGENT_NODE);

  return graph.compile({ checkpointer: deps.checkpointer });
}

export type CompiledChatGraph = ReturnType<typeof buildChatGraph>;
