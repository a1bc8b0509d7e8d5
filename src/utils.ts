import type { Logger } from "./logger";
import type { TranscriptEvent, TranscriptSink } from "./types";

// 送信先チャンネル（discord.jsのSendableChannelsが満たす最小限の形）
export interface MessageTarget {
  send(content: string): Promise<unknown>;
}

/**
 * 指定タイムゾーンのタイムスタンプを生成するヘルパー関数
 */
export function formatTimestamp(date: Date, timeZone: string): string {
  return date.toLocaleString("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hour12: false,
  });
}

export function formatTranscriptMessage(event: TranscriptEvent, timeZone: string): string {
  return `💬 **${event.displayName}** — ${formatTimestamp(event.timestamp, timeZone)}\n${event.text}`;
}

/**
 * テキストチャンネルに文字起こしを投稿（送信完了は待たない）
 */
export class ChannelTranscriptSink implements TranscriptSink {
  constructor(
    private readonly channel: MessageTarget,
    private readonly timeZone: string,
    private readonly logger: Logger
  ) {}

  emit(event: TranscriptEvent): void {
    const message = formatTranscriptMessage(event, this.timeZone);
    this.channel
      .send(message)
      .then(() => this.logger.info(`${event.displayName}: ${event.text}`))
      .catch((error: unknown) => this.logger.error("Error sending transcription:", error));
  }
}
