import { Client, GatewayIntentBits } from "discord.js";
import type { SessionController } from "./session";
import type { MessageTarget } from "./utils";

// Discordクライアント
export const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildVoiceStates, // ボイスチャンネルの状態変更を監視するために必要
  ],
});

// ギルドごとの録音セッション（1ギルドにつき1ボイス接続）
export interface GuildSession {
  controller: SessionController;
  voiceChannelId: string;
  textChannel: MessageTarget;
}

export const guildSessions = new Map<string, GuildSession>();
