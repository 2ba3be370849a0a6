import cron, { type ScheduledTask } from "node-cron";
import { loadConfig } from "./config.js";
import { runMonitorOnce } from "./monitor.js";
import { createRuntime, onShutdownSignal } from "./runtime.js";
import { errorMessage } from "./utils.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const runtime = createRuntime(config);
  const options = { watchClasses: config.watchClasses, concurrency: config.CHECK_CONCURRENCY };

  // Registered before any pass so a signal mid-pass still lets commits finish
  let task: ScheduledTask | undefined;
  onShutdownSignal("SCHEDULER", async () => {
    task?.stop();
    await runtime.shutdown();
  });

  // Single pass for an external scheduler (cron job, CI schedule)
  if (process.argv.includes("--once")) {
    try {
      const summary = await runMonitorOnce(runtime.store, runtime.pipeline, options);
      process.exitCode = summary.failed > 0 ? 1 : 0;
    } finally {
      await runtime.shutdown();
    }
    return;
  }

  console.log(`[SCHEDULER] Class monitor starting. Term ${config.CATALOG_TERM}, schedule: ${config.CRON_SCHEDULE}`);

  let running = false;
  const runGuarded = async (label: string) => {
    if (running) {
      console.log(`[SCHEDULER] ${label} run skipped, previous run still in progress`);
      return;
    }
    running = true;
    try {
      await runMonitorOnce(runtime.store, runtime.pipeline, options);
      console.log(`[SCHEDULER] ${label} run completed.`);
    } catch (err) {
      console.error(`[SCHEDULER] ${label} run error:`, errorMessage(err));
    } finally {
      running = false;
    }
  };

  // Run immediately at startup
  await runGuarded("Initial");

  if (config.TELEGRAM_ADMIN_CHAT_ID) {
    try {
      await runtime.telegram.sendMessage(
        config.TELEGRAM_ADMIN_CHAT_ID,
        `<b>Class monitor started</b>\nChecking on schedule <code>${config.CRON_SCHEDULE}</code>.`
      );
    } catch (err) {
      console.warn("[SCHEDULER] Startup notice failed:", errorMessage(err));
    }
  }

  task = cron.schedule(config.CRON_SCHEDULE, async () => {
    console.log(`[SCHEDULER] Scheduled run started at ${new Date().toISOString()}`);
    await runGuarded("Scheduled");
  });
}

main().catch((e) => {
  console.error("[SCHEDULER] Fatal:", e);
  process.exit(1);
});
