import pLimit from "p-limit";
import { handleCommand, CommandDeps } from "./commands.js";
import { loadConfig } from "./config.js";
import { createRuntime, onShutdownSignal } from "./runtime.js";
import { TelegramUpdate } from "./telegram.js";
import { errorMessage, sleep } from "./utils.js";

const POLL_SECONDS = 25;

async function main(): Promise<void> {
  const config = loadConfig();
  const runtime = createRuntime(config);
  const deps: CommandDeps = { store: runtime.store, pipeline: runtime.pipeline, term: config.CATALOG_TERM };

  const limiter = pLimit(config.CHECK_CONCURRENCY);
  const handling = new Set<Promise<void>>();
  let running = true;

  onShutdownSignal("BOT", async () => {
    running = false;
    await Promise.allSettled([...handling]);
    await runtime.shutdown();
  });

  const handle = (update: TelegramUpdate) => {
    const message = update.message;
    const text = message?.text;
    // Notifications go out as DMs, so only private chats make sense here
    if (!message || !text || message.chat.type !== "private") return;

    const chatId = String(message.chat.id);
    const userId = String(message.from?.id ?? message.chat.id);
    const reply = (html: string) => runtime.telegram.sendMessage(chatId, html);

    const task: Promise<void> = limiter(async () => {
      try {
        await handleCommand(deps, { userId, reply }, text);
      } catch (err) {
        console.error(`[BOT] Command "${text}" from ${userId} failed: ${errorMessage(err)}`);
        await reply("❌ An error occurred. Please try again.");
      }
    })
      .catch((err: unknown) => console.error(`[BOT] Could not reply to ${userId}: ${errorMessage(err)}`))
      .finally(() => handling.delete(task));
    handling.add(task);
  };

  console.log(`[BOT] Listening for commands. Term ${config.CATALOG_TERM}`);
  let offset = 0;
  while (running) {
    let updates: TelegramUpdate[];
    try {
      updates = await runtime.telegram.getUpdates(offset, POLL_SECONDS);
    } catch (err) {
      console.error(`[BOT] getUpdates failed: ${errorMessage(err)}`);
      await sleep(5000);
      continue;
    }
    for (const update of updates) {
      offset = update.update_id + 1;
      if (running) handle(update);
    }
  }
}

main().catch((e) => {
  console.error("[BOT] Fatal:", e);
  process.exit(1);
});
