import type { EventEmitter } from "node:events";
import { AppConfig } from "./config.js";
import { NotificationDispatcher } from "./dispatcher.js";
import { ClassPipeline } from "./pipeline.js";
import { CatalogScraper } from "./scraper.js";
import { createStore, Store } from "./store.js";
import { TelegramClient, TelegramNotifier } from "./telegram.js";

export interface Runtime {
  config: AppConfig;
  store: Store;
  telegram: TelegramClient;
  pipeline: ClassPipeline;
  /** Waits for in-flight checks, then releases the browser. */
  shutdown(): Promise<void>;
}

export function createRuntime(config: AppConfig): Runtime {
  const store = createStore(config);
  const telegram = new TelegramClient(config.TELEGRAM_BOT_TOKEN, config.NOTIFY_TIMEOUT_MS);
  const scraper = new CatalogScraper({
    headless: config.PLAYWRIGHT_HEADLESS,
    executablePath: config.CHROMIUM_EXECUTABLE_PATH,
    navigationTimeoutMs: Math.floor(config.SCRAPE_TIMEOUT_MS / 2),
  });
  const dispatcher = new NotificationDispatcher(store, new TelegramNotifier(telegram), {
    timeoutMs: config.NOTIFY_TIMEOUT_MS,
    delayMs: config.NOTIFY_DELAY_MS,
  });
  const pipeline = new ClassPipeline(store, scraper, dispatcher, {
    scrapeTimeoutMs: config.SCRAPE_TIMEOUT_MS,
  });

  return {
    config,
    store,
    telegram,
    pipeline,
    shutdown: drainThenClose(pipeline, scraper),
  };
}

/** In-flight checks commit before the browser they may still be using goes away. Runs once. */
export function drainThenClose(
  pipeline: Pick<ClassPipeline, "drain">,
  scraper: Pick<CatalogScraper, "close">
): () => Promise<void> {
  let done: Promise<void> | undefined;
  return () => {
    done ??= (async () => {
      await pipeline.drain();
      await scraper.close();
    })();
    return done;
  };
}

export interface SignalOptions {
  /** Where SIGINT/SIGTERM arrive. */
  signals?: Pick<EventEmitter, "on" | "off">;
  exit?: (code: number) => void;
}

/**
 * Runs `shutdown` once on SIGINT/SIGTERM, then exits. Returns a function that removes the
 * handlers again.
 */
export function onShutdownSignal(
  tag: string,
  shutdown: () => Promise<void>,
  { signals = process, exit = (code: number) => process.exit(code) }: SignalOptions = {}
): () => void {
  let stopping = false;
  const handler = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    console.log(`[${tag}] ${signal} received, finishing in-flight checks...`);
    shutdown().then(
      () => exit(0),
      (err: unknown) => {
        console.error(`[${tag}] Shutdown error:`, err);
        exit(1);
      }
    );
  };
  signals.on("SIGINT", handler);
  signals.on("SIGTERM", handler);
  return () => {
    signals.off("SIGINT", handler);
    signals.off("SIGTERM", handler);
  };
}
