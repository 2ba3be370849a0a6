import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import { formatClass } from "./classKey.js";
import { ClassState, ClassStatus, NotificationContext, NotificationKind, Notifier } from "./types.js";
import { errorMessage, escapeHtml } from "./utils.js";

const updateSchema = z.object({
  update_id: z.number(),
  message: z
    .object({
      chat: z.object({ id: z.number(), type: z.string() }),
      from: z.object({ id: z.number() }).optional(),
      text: z.string().optional(),
    })
    .optional(),
});

const updatesResponseSchema = z.object({
  ok: z.boolean(),
  result: z.array(updateSchema),
});

export type TelegramUpdate = z.infer<typeof updateSchema>;

export class TelegramClient {
  private readonly http: AxiosInstance;

  constructor(token: string, timeoutMs = 20000) {
    this.http = axios.create({
      baseURL: `https://api.telegram.org/bot${token}`,
      timeout: timeoutMs,
    });
  }

  async sendMessage(chatId: string, html: string): Promise<void> {
    await this.http.post("/sendMessage", {
      chat_id: chatId,
      text: html,
      parse_mode: "HTML",
      disable_web_page_preview: true,
    });
  }

  /** Long poll; resolves after `waitSeconds` with no updates. */
  async getUpdates(offset: number, waitSeconds: number): Promise<TelegramUpdate[]> {
    const { data } = await this.http.get("/getUpdates", {
      params: { offset, timeout: waitSeconds, allowed_updates: JSON.stringify(["message"]) },
      timeout: (waitSeconds + 10) * 1000,
    });
    return updatesResponseSchema.parse(data).result;
  }
}

const STATUS_EMOJI: Record<ClassStatus, string> = {
  Open: "✅",
  Waitlisted: "⏳",
  Full: "🔴",
  Closed: "⛔",
};

function enrollmentLines(fields: {
  enrolled: number;
  capacity: number;
  waitlistCount: number;
  waitlistCapacity: number;
}): string[] {
  const lines: string[] = [];
  if (fields.capacity > 0) lines.push(`Enrollment: ${fields.enrolled}/${fields.capacity}`);
  if (fields.waitlistCapacity > 0) lines.push(`Waitlist: ${fields.waitlistCount}/${fields.waitlistCapacity}`);
  return lines;
}

function notificationTitle(kind: NotificationKind, context: NotificationContext): string {
  const name = escapeHtml(formatClass(context));
  switch (kind) {
    case "StatusChanged":
      return `${STATUS_EMOJI[context.newStatus]} <b>${name}</b>: ${context.previousStatus} → ${context.newStatus}`;
    case "SeatsOpenedWhileOpen":
      return `${STATUS_EMOJI.Open} <b>${name}</b> has open seats`;
    case "WaitlistOpened":
      return `${STATUS_EMOJI.Waitlisted} <b>${name}</b> waitlist has room`;
  }
}

export function buildNotificationMessage(kind: NotificationKind, context: NotificationContext): string {
  const title = notificationTitle(kind, context);
  const lines = [title, escapeHtml(context.description), ...enrollmentLines(context), `Term: ${escapeHtml(context.term)}`];
  if (context.newStatus === "Open") {
    lines.push("", "<i>Act fast! Enroll before spots fill up.</i>");
  }
  return lines.join("\n");
}

export function buildStatusMessage(state: ClassState, subscribed: boolean): string {
  const lines = [
    `📚 <b>${escapeHtml(formatClass(state))}</b> (${escapeHtml(state.term)})`,
    `Status: ${STATUS_EMOJI[state.status]} <b>${state.status}</b>`,
    ...enrollmentLines(state),
    "",
    subscribed
      ? "🔔 You're subscribed to this class"
      : `Use /subscribe ${escapeHtml(formatClass(state))} to get notified when this class opens`,
  ];
  return lines.join("\n");
}

export function buildListMessage(classKeys: string[], states: Map<string, ClassState>): string {
  if (classKeys.length === 0) {
    return "📭 You're not subscribed to any classes.\nUse /subscribe SUBJECT CATALOG to get notified when classes open!";
  }
  const lines = [`📚 <b>Your subscribed classes</b> (${classKeys.length})`];
  for (const classKey of [...classKeys].sort()) {
    const state = states.get(classKey);
    if (!state) {
      lines.push("", `📌 ${escapeHtml(classKey)}`, "<i>Not checked yet</i>");
      continue;
    }
    const enrollment = state.capacity > 0 ? ` (${state.enrolled}/${state.capacity})` : "";
    lines.push(
      "",
      `${STATUS_EMOJI[state.status]} <b>${escapeHtml(formatClass(state))}</b>: ${state.status}${enrollment}`,
      `<i>Last checked ${state.lastChecked.slice(0, 16).replace("T", " ")}</i>`
    );
  }
  return lines.join("\n");
}

/** Direct messages: a Telegram user id doubles as the private chat id. */
export class TelegramNotifier implements Notifier {
  constructor(private readonly client: TelegramClient) {}

  async notify(
    userId: string,
    classKey: string,
    kind: NotificationKind,
    context: NotificationContext
  ): Promise<boolean> {
    try {
      await this.client.sendMessage(userId, buildNotificationMessage(kind, context));
      return true;
    } catch (err) {
      const status = axios.isAxiosError(err) ? err.response?.status : undefined;
      if (status === 403) {
        console.warn(`[TELEGRAM] ${userId} blocked the bot, ${classKey} ${kind} not delivered`);
      } else {
        console.warn(`[TELEGRAM] Delivery to ${userId} failed: ${errorMessage(err)}`);
      }
      return false;
    }
  }
}
