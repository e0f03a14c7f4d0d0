import { pathToFileURL } from "node:url";
import { startWebServer, type WebErrorResponse } from "../../src/adapters/web";
import { SessionManager } from "../../src/session/session.manager";
import { resolveSessionConfig } from "../config/session.config";
import { toRuntimeError } from "../error";
import { createLangGraphEngineFactory } from "../graph/langgraph.engine";
import { createChatModel } from "../llm/chat_model.factory";
import { resolveModelConfig } from "../llm/model.config";
import { parseServeArgs, SERVE_USAGE } from "./serve.args";

export function toWebErrorResponse(error: unknown): WebErrorResponse {
  const runtimeError = toRuntimeError(error);
  return {
    status: runtimeError.httpStatus,
    body: {
      errorCode: runtimeError.errorCode,
      guideMessage: runtimeError.guideMessage,
      message: runtimeError.message,
    },
  };
}

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<void> {
  const args = parseServeArgs(argv);
  if (args.help) {
    console.log(SERVE_USAGE);
    return;
  }

  const sessionConfig = resolveSessionConfig(
    {
      idleTimeoutSeconds: args.idleTimeoutSeconds,
      reaperIntervalSeconds: args.reaperIntervalSeconds,
    },
    process.env
  );
  const modelConfig = resolveModelConfig({ model: args.model }, process.env);

  const manager = new SessionManager({
    createEngine: createLangGraphEngineFactory({
      model: createChatModel(modelConfig),
      systemPrompt: modelConfig.systemPrompt,
      recursionLimit: modelConfig.recursionLimit,
    }),
    idleTimeoutMs: sessionConfig.idleTimeoutMs,
    reaperIntervalMs: sessionConfig.reaperIntervalMs,
    toolPreviewMaxLength: sessionConfig.toolPreviewMaxLength,
    fallbackText: sessionConfig.fallbackText,
  });

  const server = startWebServer({
    host: args.host,
    port: args.port,
    service: manager,
    toErrorBody: toWebErrorResponse,
  });

  const shutdown = (signal: string) => {
    console.log(`[serve] ${signal} received, shutting down`);
    server.close();
    manager
      .shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error(`[serve] SHUTDOWN_ERROR ${toRuntimeError(error).message}`);
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

function isEntrypoint(): boolean {
  const scriptPath = process.argv[1];
  if (typeof scriptPath !== "string" || scriptPath.trim() === "") {
    return false;
  }
  return import.meta.url === pathToFileURL(scriptPath).href;
}

if (isEntrypoint()) {
  main().catch((error: unknown) => {
    const runtimeError = toRuntimeError(error);
    console.error(`[serve] ${runtimeError.errorCode} ${runtimeError.message}`);
    process.exitCode = 1;
  });
}
