import * as path from "path";
import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type VoiceBasedChannel,
} from "discord.js";
import type { AppConfig } from "./config";
import { describeError } from "./errors";
import { createLogger } from "./logger";
import type { ParticipantDirectory } from "./participants";
import { SessionController } from "./session";
import { FsStagingArea } from "./staging";
import { client, guildSessions, type GuildSession } from "./state";
import { systemClock } from "./timing";
import type { TranscriptionEngine } from "./types";
import { ChannelTranscriptSink, type MessageTarget } from "./utils";
import { DiscordVoiceCapture } from "./voice";

// セッションをまたいで共有するサービス
export interface BotServices {
  config: AppConfig;
  engine: TranscriptionEngine;
  participants: ParticipantDirectory;
}

export const slashCommands = [
  new SlashCommandBuilder().setName("join").setDescription("Join your voice channel and start transcribing"),
  new SlashCommandBuilder().setName("leave").setDescription("Leave the voice channel"),
];

/**
 * スラッシュコマンドを登録（DISCORD_GUILD_IDがあればそのギルドのみ）
 */
export async function registerSlashCommands(config: AppConfig): Promise<void> {
  if (!client.application) {
    throw new Error("Client application is not available");
  }
  const body = slashCommands.map((command) => command.toJSON());
  if (config.DISCORD_GUILD_ID) {
    await client.application.commands.set(body, config.DISCORD_GUILD_ID);
    console.log(`[Commands] Registered ${body.length} commands for guild ${config.DISCORD_GUILD_ID}`);
  } else {
    await client.application.commands.set(body);
    console.log(`[Commands] Registered ${body.length} global commands`);
  }
}

function createGuildSession(
  services: BotServices,
  voiceChannel: VoiceBasedChannel,
  textChannel: MessageTarget
): GuildSession {
  const { config } = services;
  const guildId = voiceChannel.guild.id;
  // ギルドごとにステージングディレクトリを分ける
  const directory = path.join(config.RECORDINGS_DIR, guildId);

  const controller: SessionController = new SessionController({
    sessionId: guildId,
    directory,
    capture: new DiscordVoiceCapture(client, voiceChannel, createLogger("Voice", config.VERBOSE)),
    staging: new FsStagingArea(directory),
    engine: services.engine,
    participants: services.participants,
    sink: new ChannelTranscriptSink(
      textChannel,
      config.TIMESTAMP_TIME_ZONE,
      createLogger("Transcription", config.VERBOSE)
    ),
    clock: systemClock,
    logger: createLogger("Session", config.VERBOSE),
    options: config.pipeline,
    onConnectionLost: () => {
      if (guildSessions.get(guildId)?.controller === controller) {
        guildSessions.delete(guildId);
      }
      textChannel
        .send("Lost the voice connection. Transcription stopped.")
        .catch((error: unknown) => console.error(`[Voice] Failed to send notice: ${describeError(error)}`));
    },
  });

  return { controller, voiceChannelId: voiceChannel.id, textChannel };
}

/**
 * ギルドのセッションを停止（セッションがなければfalse）
 */
export async function stopGuildSession(guildId: string): Promise<boolean> {
  const session = guildSessions.get(guildId);
  if (!session) return false;

  guildSessions.delete(guildId);
  await session.controller.stop();
  return true;
}

export async function handleJoin(interaction: ChatInputCommandInteraction, services: BotServices): Promise<void> {
  if (!interaction.inCachedGuild()) {
    await interaction.reply("This command can only be used in a server.");
    return;
  }

  const voiceChannel = interaction.member.voice.channel;
  if (!voiceChannel) {
    await interaction.reply("You need to be in a voice channel first!");
    return;
  }

  const textChannel = interaction.channel;
  if (!textChannel) {
    await interaction.reply("I can't post transcripts in this channel.");
    return;
  }

  await interaction.deferReply();

  // 開始完了を待たずに登録し、並行した /join・/leave から見えるようにする
  const guildId = interaction.guildId;
  const previous = guildSessions.get(guildId);
  const session = createGuildSession(services, voiceChannel, textChannel);
  guildSessions.set(guildId, session);

  // 既存のセッションを止めてから新しいセッションを開始
  await previous?.controller.stop();
  if (guildSessions.get(guildId) !== session) {
    await interaction.editReply("Join was cancelled.");
    return;
  }

  try {
    await session.controller.start();
  } catch (error) {
    console.error(`[Commands] Error in join command: ${describeError(error)}`);
    if (guildSessions.get(guildId) === session) {
      guildSessions.delete(guildId);
    }
    await interaction.editReply("Failed to join voice channel. Please try again.");
    return;
  }

  // 開始中に /leave などで停止された場合
  if (guildSessions.get(guildId) !== session) {
    await interaction.editReply("Join was cancelled.");
    return;
  }
  await interaction.editReply(`Joined ${voiceChannel.name}`);
}

export async function handleLeave(interaction: ChatInputCommandInteraction): Promise<void> {
  if (!interaction.inCachedGuild() || !guildSessions.has(interaction.guildId)) {
    await interaction.reply("I'm not in a voice channel!");
    return;
  }

  await interaction.deferReply();
  await stopGuildSession(interaction.guildId);
  await interaction.editReply("Left the voice channel");
}
