import { rename, rm, writeFile } from "fs/promises";
import * as path from "path";
import { TransientCaptureError } from "./errors";
import { PART_SUFFIX, formatStagingFileName } from "./staging";
import type { AudioEncoding } from "./types";

// Discordから受信してデコードしたPCMの形式
export const PCM_SAMPLE_RATE = 48000;
export const PCM_CHANNELS = 2;
export const PCM_FRAME_SIZE = 960; // 20msフレーム
const BITS_PER_SAMPLE = 16;

/**
 * 16bit リニアPCM用のWAVヘッダーを作成
 */
export function createWavHeader(
  dataLength: number,
  sampleRate = PCM_SAMPLE_RATE,
  channels = PCM_CHANNELS
): Buffer {
  const header = Buffer.alloc(44);
  const byteRate = sampleRate * channels * (BITS_PER_SAMPLE / 8);
  const blockAlign = channels * (BITS_PER_SAMPLE / 8);

  header.write("RIFF", 0);
  header.writeUInt32LE(36 + dataLength, 4);
  header.write("WAVE", 8);
  header.write("fmt ", 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(BITS_PER_SAMPLE, 34);
  header.write("data", 36);
  header.writeUInt32LE(dataLength, 40);

  return header;
}

export function pcmToWav(pcm: Buffer): Buffer {
  return Buffer.concat([createWavHeader(pcm.length), pcm]);
}

/**
 * 1セグメント分のPCMを参加者ごとに蓄積し、停止時にステージングディレクトリへ書き出す
 */
export class SegmentAudioBuffer {
  private readonly chunks = new Map<string, Buffer[]>();

  constructor(
    readonly segmentId: string,
    readonly directory: string,
    readonly encoding: AudioEncoding
  ) {}

  append(participantId: string, pcm: Buffer): void {
    const existing = this.chunks.get(participantId);
    if (existing) {
      existing.push(pcm);
    } else {
      this.chunks.set(participantId, [pcm]);
    }
  }

  get participantIds(): string[] {
    return [...this.chunks.keys()];
  }

  /**
   * 参加者ごとにファイルを書き出し、パスを返す
   * 一時ファイル（.part）に書いてからリネームするため、途中のファイルは一覧に現れない
   * 書き出しに失敗した参加者があっても残りの参加者は書き出し、最後にまとめてエラーにする
   */
  async flush(): Promise<string[]> {
    const written: string[] = [];
    const failures: unknown[] = [];

    for (const [participantId, chunks] of this.chunks) {
      const pcm = Buffer.concat(chunks);
      const name = formatStagingFileName({
        segmentId: this.segmentId,
        participantId,
        encoding: this.encoding,
      });
      const filePath = path.join(this.directory, name);
      const partPath = `${filePath}${PART_SUFFIX}`;

      try {
        await writeFile(partPath, this.encoding === "wav" ? pcmToWav(pcm) : pcm);
        await rename(partPath, filePath);
        written.push(filePath);
      } catch (error) {
        failures.push(error);
        // 書きかけの一時ファイルは一覧に現れず削除もされないため、ここで消す
        await rm(partPath, { force: true }).catch((cleanupError: unknown) => failures.push(cleanupError));
      }
    }

    this.chunks.clear();

    if (failures.length > 0) {
      throw new TransientCaptureError(
        `Failed to write ${failures.length} staging file(s) for segment ${this.segmentId} ` +
          `(written: ${written.length})`,
        { cause: failures.length === 1 ? failures[0] : new AggregateError(failures) }
      );
    }
    return written;
  }
}
