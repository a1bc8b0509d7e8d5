import {
  joinVoiceChannel,
  EndBehaviorType,
  VoiceConnectionStatus,
  entersState,
  type AudioReceiveStream,
  type DiscordGatewayAdapterCreator,
  type VoiceConnection,
} from "@discordjs/voice";
import type { Client, VoiceBasedChannel } from "discord.js";
import * as prism from "prism-media";
import { PCM_CHANNELS, PCM_FRAME_SIZE, PCM_SAMPLE_RATE, SegmentAudioBuffer } from "./audio";
import { FatalConfigurationError, LookupError, TransientCaptureError } from "./errors";
import type { Logger } from "./logger";
import { sleep } from "./timing";
import type {
  AudioEncoding,
  ParticipantNameResolver,
  VoiceActivityEvent,
  VoiceCaptureProvider,
} from "./types";

const MAX_CONNECT_ATTEMPTS = 3;
const CONNECT_RETRY_BASE_DELAY = 5000; // 5秒
const READY_TIMEOUT = 60_000;
const RECONNECT_GRACE = 5_000;

/**
 * ボイスチャンネルの音声を参加者ごとに受信し、セグメント単位でファイルに書き出す
 */
export class DiscordVoiceCapture implements VoiceCaptureProvider {
  private connection: VoiceConnection | null = null;
  private current: SegmentAudioBuffer | null = null;
  private readonly streams = new Map<string, AudioReceiveStream>();
  private readonly listeners = new Set<(event: VoiceActivityEvent) => void>();
  private readonly closedListeners = new Set<() => void>();

  constructor(
    private readonly client: Client,
    private readonly channel: VoiceBasedChannel,
    private readonly logger: Logger
  ) {}

  get voiceChannelId(): string {
    return this.channel.id;
  }

  /**
   * ボイスチャンネルに接続（再試行あり）
   */
  async connect(): Promise<void> {
    if (this.connection && this.connection.state.status !== VoiceConnectionStatus.Destroyed) {
      return;
    }

    let lastError: unknown;
    for (let attempt = 1; attempt <= MAX_CONNECT_ATTEMPTS; attempt++) {
      try {
        this.logger.info(`Connection attempt ${attempt}/${MAX_CONNECT_ATTEMPTS}`);
        await this.connectInternal();
        return;
      } catch (error) {
        lastError = error;
        this.logger.error(`Connection attempt ${attempt}/${MAX_CONNECT_ATTEMPTS} failed:`, error);

        if (attempt < MAX_CONNECT_ATTEMPTS) {
          // 指数バックオフで待機時間を計算（5秒、10秒）
          const delay = CONNECT_RETRY_BASE_DELAY * Math.pow(2, attempt - 1);
          this.logger.info(`Retrying in ${delay / 1000} seconds...`);
          await sleep(delay);
        }
      }
    }

    throw new FatalConfigurationError(
      `Could not connect to voice channel ${this.channel.name} after ${MAX_CONNECT_ATTEMPTS} attempts`,
      { cause: lastError }
    );
  }

  private async connectInternal(): Promise<void> {
    this.logger.info(`Joining voice channel: ${this.channel.name}`);
    const connection = joinVoiceChannel({
      channelId: this.channel.id,
      guildId: this.channel.guild.id,
      adapterCreator: this.channel.guild.voiceAdapterCreator as DiscordGatewayAdapterCreator,
      selfDeaf: false,
      selfMute: true,
    });

    try {
      await entersState(connection, VoiceConnectionStatus.Ready, READY_TIMEOUT);
    } catch (error) {
      connection.destroy();
      throw error;
    }
    this.logger.info(`✓ Connected to voice channel: ${this.channel.name}`);

    connection.on("stateChange", (oldState, newState) => {
      this.logger.debug(`State change: ${oldState.status} -> ${newState.status}`);
    });

    // 切断された場合、再接続を待ってダメなら破棄
    connection.on(VoiceConnectionStatus.Disconnected, async () => {
      this.logger.warn("Disconnected from voice channel");
      try {
        await Promise.race([
          entersState(connection, VoiceConnectionStatus.Signalling, RECONNECT_GRACE),
          entersState(connection, VoiceConnectionStatus.Connecting, RECONNECT_GRACE),
        ]);
      } catch {
        connection.destroy();
      }
    });

    connection.on(VoiceConnectionStatus.Destroyed, () => {
      this.logger.info("Connection destroyed");
      this.releaseStreams();
      // disconnect()以外での破棄（再接続の猶予切れなど）は上位に通知
      if (this.connection === connection) {
        this.connection = null;
        for (const listener of this.closedListeners) {
          listener();
        }
      }
    });

    const { speaking } = connection.receiver;
    speaking.on("start", (userId) => {
      if (this.isBot(userId)) return;
      this.logger.debug(`User ${userId} started speaking`);
      this.subscribe(connection, userId);
      this.notify({ participantId: userId, speaking: true });
    });
    speaking.on("end", (userId) => {
      if (this.isBot(userId)) return;
      this.logger.debug(`User ${userId} stopped speaking`);
      // 他の参加者がまだ話していれば発話中のまま
      this.notify({ participantId: userId, speaking: this.hasHumanSpeakers(connection) });
    });

    this.connection = connection;
  }

  async disconnect(): Promise<void> {
    this.current = null;
    this.releaseStreams();
    if (this.connection) {
      const connection = this.connection;
      this.connection = null;
      if (connection.state.status !== VoiceConnectionStatus.Destroyed) {
        connection.destroy();
      }
    }
  }

  async startCapture(directory: string, encoding: AudioEncoding, segmentId: string): Promise<void> {
    if (!this.connection || this.connection.state.status !== VoiceConnectionStatus.Ready) {
      throw new TransientCaptureError("Voice connection is not ready");
    }
    // 未確定のセグメントが残っていれば先に書き出す
    if (this.current) {
      await this.stopCapture();
    }
    this.current = new SegmentAudioBuffer(segmentId, directory, encoding);
  }

  async stopCapture(): Promise<string[]> {
    const segment = this.current;
    this.current = null;
    if (!segment) return [];
    return segment.flush();
  }

  onActivity(listener: (event: VoiceActivityEvent) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  onClosed(listener: () => void): () => void {
    this.closedListeners.add(listener);
    return () => {
      this.closedListeners.delete(listener);
    };
  }

  private notify(event: VoiceActivityEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  private isBot(userId: string): boolean {
    return this.client.users.cache.get(userId)?.bot ?? false;
  }

  private hasHumanSpeakers(connection: VoiceConnection): boolean {
    for (const userId of connection.receiver.speaking.users.keys()) {
      if (!this.isBot(userId)) return true;
    }
    return false;
  }

  /**
   * ユーザーの音声ストリームを購読し、デコードしたPCMを現在のセグメントに追加
   */
  private subscribe(connection: VoiceConnection, userId: string): void {
    if (this.streams.has(userId)) return;

    this.logger.info(`Starting new audio stream for ${userId}`);
    const audioStream = connection.receiver.subscribe(userId, {
      end: { behavior: EndBehaviorType.Manual },
    });
    this.streams.set(userId, audioStream);

    const opusDecoder = new prism.opus.Decoder({
      rate: PCM_SAMPLE_RATE,
      channels: PCM_CHANNELS,
      frameSize: PCM_FRAME_SIZE,
    });

    // pipelineではなくpipeを使用し、個別パケットのデコードエラーでストリーム全体が止まらないようにする
    audioStream.pipe(opusDecoder);

    opusDecoder.on("data", (pcm: Buffer) => {
      this.current?.append(userId, pcm);
    });
    opusDecoder.on("error", (error: Error) => {
      this.logger.debug(`Opus decode error for ${userId} (ignoring packet): ${error.message}`);
    });

    audioStream.on("error", (error: Error) => {
      if (error.message.includes("Decode error")) {
        this.logger.debug(`Stream decode error for ${userId} (ignoring packet): ${error.message}`);
        return;
      }
      this.logger.error(`Stream error for ${userId}:`, error);
      this.releaseStream(userId);
    });
    audioStream.on("end", () => {
      this.logger.info(`Stream ended for ${userId}`);
      this.streams.delete(userId);
    });
  }

  private releaseStream(userId: string): void {
    const stream = this.streams.get(userId);
    if (!stream) return;
    this.streams.delete(userId);
    stream.destroy();
  }

  private releaseStreams(): void {
    for (const userId of [...this.streams.keys()]) {
      this.releaseStream(userId);
    }
  }
}

/**
 * ギルドメンバーの表示名を取得
 */
export class DiscordNameResolver implements ParticipantNameResolver {
  constructor(private readonly client: Client) {}

  async resolve(participantId: string, sessionId: string): Promise<string> {
    try {
      const guild = await this.client.guilds.fetch(sessionId);
      const member = await guild.members.fetch(participantId);
      return member.displayName || member.user.username;
    } catch (error) {
      throw new LookupError(`Error fetching username for ${participantId}`, { cause: error });
    }
  }
}
