/**
 * High-score notifications. Every alert is logged; it is also sent to Telegram
 * when a bot token and chat id are configured.
 */

import type { Logger } from "../logger";
import type { AlertConfig } from "../config";
import { errorMessage } from "../errors";
import type { Enrichment, Posting } from "../types";

export interface HighScoreAlert {
  score: number;
  posting: Pick<Posting, "title" | "link" | "source" | "provider">;
  enrichment?: Enrichment;
}

export interface Notifier {
  sendHighScoreAlert(alert: HighScoreAlert): Promise<boolean>;
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function formatHighScoreMessage(alert: HighScoreAlert): string {
  const { score, posting, enrichment } = alert;
  const lines = [
    `🎯 <b>${escapeHtml(posting.title || "Untitled job")}</b>`,
    `Fit score: <b>${score}</b>/100`,
    `Source: ${escapeHtml(posting.source || posting.provider || "unknown")}`,
  ];
  const summary = enrichment?.ai_summary;
  if (summary) {
    lines.push("", escapeHtml(String(summary)));
  }
  lines.push("", `<a href="${escapeHtml(posting.link.trim())}">Open posting</a>`);
  return lines.join("\n");
}

/** Numeric value of `ai_fit_score`, or null when it is missing or not a number. */
export function parseFitScore(enrichment: Enrichment): number | null {
  const raw = enrichment.ai_fit_score;
  if (raw === undefined || raw === "") return null;
  const score = typeof raw === "number" ? raw : Number.parseFloat(raw);
  return Number.isFinite(score) ? score : null;
}

export function createNotifier(
  config: AlertConfig,
  logger: Logger,
  fetchFn: typeof fetch = fetch,
): Notifier {
  async function sendTelegram(text: string): Promise<boolean> {
    const response = await fetchFn(
      `https://api.telegram.org/bot${config.telegramBotToken}/sendMessage`,
      {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          chat_id: config.telegramChatId,
          text,
          parse_mode: "HTML",
          disable_web_page_preview: true,
        }),
      },
    );
    const result: unknown = await response.json();
    if (typeof result !== "object" || result === null || !("ok" in result)) {
      throw new Error(`Telegram API returned HTTP ${response.status}`);
    }
    if (result.ok !== true) {
      const description =
        "description" in result && typeof result.description === "string"
          ? result.description
          : "Telegram API error";
      throw new Error(description);
    }
    return true;
  }

  return {
    async sendHighScoreAlert(alert) {
      logger.info("notification.high_score", {
        event: "notification.high_score",
        score: alert.score,
        jobTitle: alert.posting.title,
        jobLink: alert.posting.link,
        jobSource: alert.posting.source || alert.posting.provider,
        aiSummary: alert.enrichment?.ai_summary ?? "",
      });

      if (!config.telegramBotToken || !config.telegramChatId) {
        return false;
      }

      const text = formatHighScoreMessage(alert);
      if (config.dryRun) {
        logger.info(`[DRY RUN] Would send alert: ${text.substring(0, 200)}`);
        return false;
      }

      try {
        return await sendTelegram(text);
      } catch (error) {
        logger.error(`Telegram alert send failed: ${errorMessage(error)}`);
        return false;
      }
    },
  };
}
