import { chromium, Browser, Page } from "playwright-core";
import { formatClass } from "./classKey.js";
import { ScrapeError } from "./errors.js";
import { ClassStatus, ClassTarget, SnapshotSource } from "./types.js";
import { errorMessage } from "./utils.js";

const BASE_URL = "https://sa.ucla.edu/ro/public/soc/Results";

export interface ScraperOptions {
  headless: boolean;
  executablePath?: string;
  navigationTimeoutMs?: number;
}

export interface EnrollmentReading {
  status: ClassStatus | null;
  enrolled: number;
  capacity: number;
}

export interface WaitlistReading {
  waitlistCount: number;
  waitlistCapacity: number;
}

export function buildClassUrl(subject: string, term: string): string {
  // The search expects the subject code padded to six characters
  const params = new URLSearchParams({
    t: term,
    sBy: "subject",
    subj: subject.padEnd(6),
    catlg: "",
    cls_no: "",
    s_g_cd: "%",
  });
  return `${BASE_URL}?${params.toString()}`;
}

function dataRows(texts: string[], header: string): string[] {
  return texts.map((t) => t.replace(/\s+/g, " ").trim()).filter((t) => t && t !== header);
}

/** Reads the first section row of the status column, e.g. "Open 45 of 50 Enrolled". */
export function parseStatusTexts(texts: string[]): EnrollmentReading {
  const reading: EnrollmentReading = { status: null, enrolled: 0, capacity: 0 };
  const [row] = dataRows(texts, "Status");
  if (!row) return reading;

  const counts = row.match(/(\d+)\s+of\s+(\d+)/);
  if (counts) {
    reading.enrolled = parseInt(counts[1], 10);
    reading.capacity = parseInt(counts[2], 10);
  }

  const full = row.match(/Class Full\s*\((\d+)\)/i);
  if (full) {
    reading.capacity = parseInt(full[1], 10);
    reading.enrolled = reading.capacity;
  }

  // "Class Full (N)" outranks a plain "Closed"; only a cancelled section is Closed regardless
  if (/Cancelled/i.test(row)) {
    reading.status = "Closed";
  } else if (/Waitlist/i.test(row)) {
    reading.status = "Waitlisted";
  } else if (full) {
    reading.status = "Full";
  } else if (/Closed/i.test(row)) {
    reading.status = "Closed";
  } else if (/Open/i.test(row)) {
    reading.status = "Open";
  }
  return reading;
}

/** "3 of 10 Taken" style waitlist cell; "No Waitlist" reads as 0 of 0. */
export function parseWaitlistTexts(texts: string[]): WaitlistReading {
  const [row] = dataRows(texts, "Waitlist");
  const counts = row?.match(/(\d+)\s+of\s+(\d+)/);
  if (!counts) return { waitlistCount: 0, waitlistCapacity: 0 };
  return { waitlistCount: parseInt(counts[1], 10), waitlistCapacity: parseInt(counts[2], 10) };
}

function escapeRegExp(input: string): string {
  return input.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

async function scrapeClass(page: Page, target: ClassTarget, timeoutMs: number) {
  await page.goto(buildClassUrl(target.subject, target.term), { waitUntil: "networkidle", timeout: timeoutMs });

  // Course buttons read "124G - Course Title"
  const button = page
    .locator("button", { hasText: new RegExp(`^\\s*${escapeRegExp(target.catalogNumber)}\\s+-`) })
    .first();
  try {
    await button.waitFor({ state: "visible", timeout: Math.min(timeoutMs, 10000) });
  } catch {
    throw new ScrapeError(`${formatClass(target)} not listed for term ${target.term}`);
  }
  await button.click();

  // Row 0 of each column is its header
  await page.locator(".statusColumn").nth(1).waitFor({ timeout: timeoutMs });

  const status = parseStatusTexts(await page.locator(".statusColumn").allTextContents());
  const waitlist = parseWaitlistTexts(await page.locator(".waitlistColumn").allTextContents());
  if (!status.status) {
    throw new ScrapeError(`Could not read enrollment status for ${formatClass(target)}`);
  }

  return {
    subject: target.subject,
    catalogNumber: target.catalogNumber,
    term: target.term,
    status: status.status,
    enrolled: status.enrolled,
    capacity: status.capacity,
    ...waitlist,
    observedAt: new Date().toISOString(),
  };
}

export class CatalogScraper implements SnapshotSource {
  private browser: Promise<Browser> | null = null;

  constructor(private readonly options: ScraperOptions) {}

  private async launch(): Promise<Browser> {
    if (!this.browser) {
      this.browser = chromium.launch({
        headless: this.options.headless,
        executablePath: this.options.executablePath,
      });
    }
    try {
      return await this.browser;
    } catch (err) {
      // Let the next scrape try launching again
      this.browser = null;
      throw new ScrapeError(`Browser launch failed: ${errorMessage(err)}`);
    }
  }

  async close(): Promise<void> {
    if (!this.browser) return;
    const pending = this.browser;
    this.browser = null;
    const browser = await pending.catch((err: unknown) => {
      console.warn(`[SCRAPE] Browser never started: ${errorMessage(err)}`);
      return null;
    });
    await browser?.close();
  }

  async scrape(target: ClassTarget): Promise<unknown> {
    const browser = await this.launch();
    const page = await browser.newPage();
    try {
      return await scrapeClass(page, target, this.options.navigationTimeoutMs ?? 30000);
    } finally {
      await page.close();
    }
  }
}
