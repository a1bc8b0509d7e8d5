import { describeError } from "./errors";
import { handleJoin, handleLeave, registerSlashCommands, stopGuildSession, type BotServices } from "./commands";
import { client, guildSessions } from "./state";

/**
 * Discordイベントハンドラを登録
 */
export function registerEventHandlers(services: BotServices) {
  client.once("ready", async () => {
    console.log(`Logged in as ${client.user?.tag}`);

    try {
      await registerSlashCommands(services.config);
    } catch (error) {
      console.error("An error occurred during startup:", error);
      process.exitCode = 1;
    }
  });

  client.on("interactionCreate", async (interaction) => {
    if (!interaction.isChatInputCommand()) return;

    try {
      switch (interaction.commandName) {
        case "join":
          await handleJoin(interaction, services);
          break;
        case "leave":
          await handleLeave(interaction);
          break;
        default:
          console.log(`[Commands] Unknown command: ${interaction.commandName}`);
      }
    } catch (error) {
      console.error(`[Commands] Error handling /${interaction.commandName}: ${describeError(error)}`);
    }
  });

  // ボイスチャンネルの入退室を監視
  client.on("voiceStateUpdate", async (oldState, newState) => {
    try {
      const guildId = oldState.guild.id;
      const session = guildSessions.get(guildId);
      if (!session) return;

      const member = newState.member || oldState.member;
      if (!member) return;

      // botが切断された場合はセッションを終了
      if (member.id === client.user?.id) {
        if (oldState.channelId && !newState.channelId) {
          console.log("[Voice] Bot was disconnected from the voice channel, stopping session");
          await stopGuildSession(guildId);
        }
        return;
      }

      if (member.user.bot) return;

      // 対象ボイスチャンネルから非BOTユーザーが退出・移動し、チャンネルが空になればbotも切断する
      if (oldState.channelId === session.voiceChannelId && newState.channelId !== session.voiceChannelId) {
        const remainingNonBotCount = oldState.channel?.members.filter((m) => !m.user.bot).size ?? 0;
        if (remainingNonBotCount === 0) {
          console.log("[Voice] Voice channel is now empty, stopping session");
          await stopGuildSession(guildId);
          await session.textChannel.send("Everyone left the voice channel. Transcription stopped.");
        }
      }
    } catch (error) {
      console.error("Error in voiceStateUpdate handler:", error);
    }
  });
}
