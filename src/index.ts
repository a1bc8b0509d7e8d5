import * as sodium from "libsodium-wrappers";
import { loadConfig, logConfig, type AppConfig } from "./config";
import { DeepgramTranscriptionEngine } from "./deepgram";
import { describeError } from "./errors";
import { registerEventHandlers } from "./events";
import { createLogger } from "./logger";
import { ParticipantDirectory } from "./participants";
import { client, guildSessions } from "./state";
import { stopGuildSession } from "./commands";
import { DiscordNameResolver } from "./voice";

/**
 * 設定を読み込み、不備があればプロセスを終了
 */
function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    console.error(`Error: ${describeError(error)}`);
    process.exit(1);
  }
}

const config = loadConfigOrExit();
logConfig(config);

registerEventHandlers({
  config,
  engine: new DeepgramTranscriptionEngine(config.DEEPGRAM_API_KEY, createLogger("Deepgram", config.VERBOSE)),
  participants: new ParticipantDirectory(new DiscordNameResolver(client), createLogger("Users", config.VERBOSE)),
});

/**
 * 全セッションを停止してからクライアントを終了
 */
async function shutdown(signal: string): Promise<void> {
  console.log(`\n[Shutdown] ${signal} received, cleaning up...`);

  await Promise.allSettled([...guildSessions.keys()].map((guildId) => stopGuildSession(guildId)));

  await client.destroy();
  process.exit(0);
}

// プロセス終了時のクリーンアップ
for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error) => {
      console.error("[Shutdown] Cleanup failed:", error);
      process.exit(1);
    });
  });
}

// メイン処理を非同期関数でラップ
(async () => {
  // libsodiumを初期化（音声接続の暗号化に必要）
  await sodium.ready;
  console.log("[Init] libsodium initialized");

  // Discordクライアントにログイン
  await client.login(config.DISCORD_BOT_TOKEN);
})().catch((error) => {
  console.error("Failed to start bot:", error);
  process.exit(1);
});
