import { formatClass, makeClassKey, parseClassSpec } from "./classKey.js";
import { UnknownClassError } from "./errors.js";
import { CheckOutcome } from "./pipeline.js";
import { Store } from "./store.js";
import { buildListMessage, buildStatusMessage } from "./telegram.js";
import { ClassState, ClassTarget } from "./types.js";
import { escapeHtml } from "./utils.js";

export interface CommandDeps {
  store: Store;
  pipeline: { check(target: ClassTarget): Promise<CheckOutcome> };
  term: string;
}

export interface CommandContext {
  userId: string;
  reply(html: string): Promise<void>;
}

export interface ParsedCommand {
  name: string;
  args: string;
}

const HELP = [
  "<b>Class seat monitor</b>",
  "/check SUBJECT CATALOG: current availability, e.g. <code>/check COM SCI 111</code>",
  "/subscribe SUBJECT CATALOG: get a message when seats open",
  "/unsubscribe SUBJECT CATALOG: stop messages for a class",
  "/list: your subscriptions",
].join("\n");

/** "/check@SomeBot COM SCI 111" -> { name: "check", args: "COM SCI 111" } */
export function parseCommand(text: string): ParsedCommand | null {
  const match = text.trim().match(/^\/([a-z_]+)(?:@\S+)?(?:\s+([\s\S]*))?$/i);
  if (!match) return null;
  return { name: match[1].toLowerCase(), args: (match[2] ?? "").trim() };
}

function stateFrom(outcome: CheckOutcome): ClassState | null {
  return outcome.kind === "baseline" || outcome.kind === "evaluated" ? outcome.state : null;
}

/** Runs the pipeline and falls back to the last stored state when the check was skipped. */
async function checkNow(deps: CommandDeps, target: ClassTarget): Promise<ClassState | null> {
  const outcome = await deps.pipeline.check(target);
  return stateFrom(outcome) ?? (await deps.store.load(makeClassKey(target)));
}

async function handleCheck(deps: CommandDeps, ctx: CommandContext, target: ClassTarget): Promise<void> {
  const classKey = makeClassKey(target);
  const state = await checkNow(deps, target);
  if (!state) {
    await ctx.reply(
      `❌ Could not find ${escapeHtml(formatClass(target))} for term ${escapeHtml(target.term)}.\n` +
        "Make sure the class exists and the term code is correct."
    );
    return;
  }
  const subscribed = (await deps.store.classesOf(ctx.userId)).has(classKey);
  await ctx.reply(buildStatusMessage(state, subscribed));
}

async function handleSubscribe(deps: CommandDeps, ctx: CommandContext, target: ClassTarget): Promise<void> {
  const classKey = makeClassKey(target);
  const name = escapeHtml(formatClass(target));
  if ((await deps.store.classesOf(ctx.userId)).has(classKey)) {
    await ctx.reply(`ℹ️ You're already subscribed to ${name}!`);
    return;
  }

  const state = await checkNow(deps, target);
  if (!state) {
    await ctx.reply(`❌ Could not check ${name} right now. Please try again.`);
    return;
  }

  try {
    await deps.store.subscribe(ctx.userId, classKey);
  } catch (err) {
    if (!(err instanceof UnknownClassError)) throw err;
    await ctx.reply(`❌ Failed to subscribe to ${name}. Please try again.`);
    return;
  }

  const enrollment = state.capacity > 0 ? ` (${state.enrolled}/${state.capacity})` : "";
  await ctx.reply(
    `✅ Subscribed to <b>${name}</b>!\n` +
      `📊 Current status: <b>${state.status}</b>${enrollment}\n\n` +
      "I'll message you when this class has open spots.\n" +
      `<i>Use /unsubscribe ${name} to stop notifications.</i>`
  );
}

async function handleUnsubscribe(deps: CommandDeps, ctx: CommandContext, target: ClassTarget): Promise<void> {
  const name = escapeHtml(formatClass(target));
  const removed = await deps.store.unsubscribe(ctx.userId, makeClassKey(target));
  await ctx.reply(removed ? `✅ Unsubscribed from ${name}.` : `ℹ️ You're not subscribed to ${name}.`);
}

async function handleList(deps: CommandDeps, ctx: CommandContext): Promise<void> {
  const classKeys = [...(await deps.store.classesOf(ctx.userId))];
  const states = new Map<string, ClassState>();
  for (const classKey of classKeys) {
    const state = await deps.store.load(classKey);
    if (state) states.set(classKey, state);
  }
  await ctx.reply(buildListMessage(classKeys, states));
}

export async function handleCommand(deps: CommandDeps, ctx: CommandContext, text: string): Promise<void> {
  const command = parseCommand(text);
  if (!command || command.name === "start" || command.name === "help") {
    await ctx.reply(HELP);
    return;
  }

  if (command.name === "list") {
    await handleList(deps, ctx);
    return;
  }

  let handler: (deps: CommandDeps, ctx: CommandContext, target: ClassTarget) => Promise<void>;
  switch (command.name) {
    case "check":
      handler = handleCheck;
      break;
    case "subscribe":
      handler = handleSubscribe;
      break;
    case "unsubscribe":
      handler = handleUnsubscribe;
      break;
    default:
      await ctx.reply(`Unknown command /${escapeHtml(command.name)}. Try /help`);
      return;
  }

  const target = parseClassSpec(command.args, deps.term);
  if (!target) {
    await ctx.reply(`Usage: <code>/${command.name} SUBJECT CATALOG</code>, e.g. <code>/${command.name} COM SCI 111</code>`);
    return;
  }
  await handler(deps, ctx, target);
}
