import { FatalConfigurationError } from "./errors";
import type { AudioEncoding, PipelineOptions } from "./types";

export interface AppConfig {
  DISCORD_BOT_TOKEN: string;
  DISCORD_GUILD_ID: string; // 空ならスラッシュコマンドをグローバル登録
  DEEPGRAM_API_KEY: string;
  RECORDINGS_DIR: string;
  VERBOSE: boolean;
  TIMESTAMP_TIME_ZONE: string;
  pipeline: PipelineOptions;
}

type Env = Record<string, string | undefined>;

function requireString(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new FatalConfigurationError(`${name} is not set`);
  }
  return value;
}

function readInt(env: Env, name: string, defaultValue: number): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return defaultValue;

  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0) {
    throw new FatalConfigurationError(`${name} must be a non-negative integer (got "${raw}")`);
  }
  return value;
}

function readNumber(env: Env, name: string, defaultValue: number): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return defaultValue;

  const value = Number(raw);
  if (Number.isNaN(value) || value < 0) {
    throw new FatalConfigurationError(`${name} must be a non-negative number (got "${raw}")`);
  }
  return value;
}

function readEncoding(env: Env): AudioEncoding {
  const raw = env.RECORDING_ENCODING || "wav";
  if (raw !== "wav" && raw !== "pcm") {
    throw new FatalConfigurationError(`RECORDING_ENCODING must be "wav" or "pcm" (got "${raw}")`);
  }
  return raw;
}

/**
 * 環境変数から設定を読み込む（不備があれば FatalConfigurationError）
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const pipeline: PipelineOptions = {
    recorder: {
      baseDurationMs: readInt(env, "RECORDING_BASE_DURATION_MS", 20_000), // 最低録音時間
      graceMs: readInt(env, "RECORDING_GRACE_MS", 2_000), // 発話中の延長幅
      silenceHoldMs: readInt(env, "SILENCE_HOLD_MS", 1_000), // 停止に必要な無音時間
      tickMs: readInt(env, "RECORDER_TICK_MS", 100),
      retryBackoffMs: readInt(env, "CAPTURE_RETRY_BACKOFF_MS", 500),
      encoding: readEncoding(env),
    },
    sweeper: {
      tickMs: readInt(env, "SWEEP_INTERVAL_MS", 500),
      settleMs: readInt(env, "FILE_SETTLE_MS", 750), // 書き込み完了とみなすファイルの経過時間
      minBytes: readInt(env, "MIN_SEGMENT_BYTES", 1024), // これ以下は無音とみなす
      transcriptionTimeoutMs: readInt(env, "TRANSCRIPTION_TIMEOUT_MS", 60_000),
      transcription: {
        model: env.DEEPGRAM_MODEL || "nova-3",
        language: env.TRANSCRIPTION_LANGUAGE || "en",
        smartFormat: env.TRANSCRIPTION_SMART_FORMAT !== "false", // デフォルトはtrue
        punctuate: env.TRANSCRIPTION_PUNCTUATE !== "false", // デフォルトはtrue
        fillerWords: env.TRANSCRIPTION_FILLER_WORDS === "true",
        minConfidence: readNumber(env, "TRANSCRIPTION_MIN_CONFIDENCE", 0),
      },
    },
    sessionSettleMs: readInt(env, "SESSION_SETTLE_MS", 1_000),
  };

  return {
    DISCORD_BOT_TOKEN: requireString(env, "DISCORD_BOT_TOKEN"),
    DISCORD_GUILD_ID: env.DISCORD_GUILD_ID || "",
    DEEPGRAM_API_KEY: requireString(env, "DEEPGRAM_API_KEY"),
    RECORDINGS_DIR: env.RECORDINGS_DIR || "recordings",
    VERBOSE: env.VERBOSE === "true",
    TIMESTAMP_TIME_ZONE: env.TIMESTAMP_TIME_ZONE || "UTC",
    pipeline,
  };
}

function mask(secret: string): string {
  return secret ? `${secret.substring(0, 8)}...` : "未設定";
}

/**
 * 起動時に設定の状態を出力（秘密情報はマスク）
 */
export function logConfig(config: AppConfig): void {
  const { recorder, sweeper, sessionSettleMs } = config.pipeline;
  console.log("=== 環境変数の状態 ===");
  console.log(`VERBOSE: ${config.VERBOSE}`);
  console.log(`DISCORD_BOT_TOKEN: ${config.DISCORD_BOT_TOKEN ? "設定済み" : "未設定"}`);
  console.log(`DISCORD_GUILD_ID: ${config.DISCORD_GUILD_ID || "未設定 (グローバル登録)"}`);
  console.log(`DEEPGRAM_API_KEY: ${mask(config.DEEPGRAM_API_KEY)}`);
  console.log(`RECORDINGS_DIR: ${config.RECORDINGS_DIR}`);
  console.log(
    `録音: base=${recorder.baseDurationMs}ms grace=${recorder.graceMs}ms silence=${recorder.silenceHoldMs}ms ` +
      `tick=${recorder.tickMs}ms encoding=${recorder.encoding}`
  );
  console.log(
    `文字起こし: interval=${sweeper.tickMs}ms settle=${sweeper.settleMs}ms minBytes=${sweeper.minBytes} ` +
      `timeout=${sweeper.transcriptionTimeoutMs}ms model=${sweeper.transcription.model} ` +
      `language=${sweeper.transcription.language}`
  );
  console.log(`SESSION_SETTLE_MS: ${sessionSettleMs}`);
  console.log("====================");
}
