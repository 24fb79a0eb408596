/**
 * Entry point: load config, select the history backend, wire ASR/LLM into the orchestrator,
 * start the health server and read inbound messages from the console inbox.
 * The webhook transport lives outside this repository and drives Orchestrator the same way.
 */

import { createASR } from "./adapters/asr";
import { createLLM } from "./adapters/llm";
import { loadConfig } from "./config";
import { startHealthServer } from "./health-server";
import { ConsoleInbox } from "./inbound/console";
import { logError, logger } from "./logging";
import { ContextStore } from "./memory/context-store";
import { Orchestrator } from "./pipeline/orchestrator";
import { PromptManager } from "./prompts/prompt-manager";

async function main(): Promise<void> {
  const config = loadConfig();
  const store = await ContextStore.create(config.history);
  const asr = createASR(config);
  const llm = createLLM(config);

  const orchestrator = new Orchestrator(asr, llm, store, {
    promptManager: new PromptManager({
      systemPrompt: config.assistant.systemPrompt,
      firstMessagePrompt: config.assistant.firstMessagePrompt,
    }),
    fallbackReply: config.assistant.fallbackReply,
    maxTokens: config.llm.maxTokens,
  }, {
    onUserTranscript: (userId, text) => logger.info({ event: "USER_MESSAGE", userId, textLength: text.length }, "User message"),
    onAgentReply: (userId, text) => logger.info({ event: "AGENT_REPLY", userId, textLength: text.length }, "Agent replied"),
  });

  const server = startHealthServer({ port: config.server.healthPort, store });

  const shutdown = async (): Promise<void> => {
    server.close();
    await store.close();
  };

  process.on("SIGINT", () => {
    shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        logError(logger, err instanceof Error ? err : new Error(String(err)));
        process.exit(1);
      }
    );
  });

  logger.info({ event: "READY", backend: store.backendKind }, "Type `<user>: <message>` to simulate inbound messages");
  await new ConsoleInbox().run(({ userId, text }) => orchestrator.handleText(userId, text));
  await shutdown();
}

main().catch((err: unknown) => {
  logError(logger, err instanceof Error ? err : new Error(String(err)));
  process.exit(1);
});
