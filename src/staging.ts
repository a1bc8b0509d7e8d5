import { mkdir, readdir, rm, stat } from "fs/promises";
import * as path from "path";
import type { AudioEncoding, StagingArea, StagingFile } from "./types";

// <segmentId>_<participantId>.<encoding>  例: 1718000000000-3_123456789012345678.wav
const STAGING_FILE_PATTERN = /^(\d+-\d+)_([A-Za-z0-9-]+)\.(wav|pcm)$/;
const PARTICIPANT_ID_PATTERN = /^[A-Za-z0-9-]+$/;
const SEGMENT_ID_PATTERN = /^\d+-\d+$/;
export const PART_SUFFIX = ".part";

export interface StagingFileName {
  segmentId: string;
  participantId: string;
  encoding: AudioEncoding;
}

export function formatStagingFileName({ segmentId, participantId, encoding }: StagingFileName): string {
  if (!SEGMENT_ID_PATTERN.test(segmentId)) {
    throw new Error(`Invalid segment id for staging file: ${segmentId}`);
  }
  if (!PARTICIPANT_ID_PATTERN.test(participantId)) {
    throw new Error(`Invalid participant id for staging file: ${participantId}`);
  }
  return `${segmentId}_${participantId}.${encoding}`;
}

/**
 * ファイル名から参加者IDを復元（形式が一致しなければnull）
 */
export function parseStagingFileName(name: string): StagingFileName | null {
  const match = STAGING_FILE_PATTERN.exec(name);
  if (!match) return null;

  const [, segmentId, participantId, extension] = match;
  const encoding: AudioEncoding = extension === "pcm" ? "pcm" : "wav";
  return { segmentId, participantId, encoding };
}

export function isStagingFileName(name: string): boolean {
  return STAGING_FILE_PATTERN.test(name);
}

/**
 * ファイルシステム上のステージングディレクトリ
 */
export class FsStagingArea implements StagingArea {
  constructor(readonly directory: string) {}

  /**
   * ディレクトリを作成し、前回の異常終了で残った一時ファイル（.part）を削除
   */
  async prepare(): Promise<void> {
    await mkdir(this.directory, { recursive: true });

    const stale = (await readdir(this.directory)).filter((name) => name.endsWith(PART_SUFFIX));
    for (const name of stale) {
      await rm(path.join(this.directory, name), { force: true });
    }
  }

  async list(): Promise<StagingFile[]> {
    const names = (await readdir(this.directory)).filter(isStagingFileName).sort();
    const files: StagingFile[] = [];

    for (const name of names) {
      const filePath = path.join(this.directory, name);
      try {
        const stats = await stat(filePath);
        if (!stats.isFile()) continue;
        files.push({
          path: filePath,
          name,
          sizeBytes: stats.size,
          modifiedAt: stats.mtimeMs,
        });
      } catch (error) {
        // 一覧取得後に削除されたファイルは無視
        if (isNotFound(error)) continue;
        throw error;
      }
    }

    return files;
  }

  async remove(filePath: string): Promise<void> {
    await rm(filePath, { force: true });
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
