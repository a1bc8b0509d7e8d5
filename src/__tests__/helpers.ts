import { vi } from "vitest";
import { VoiceActivityTracker } from "../activity";
import type { Logger } from "../logger";
import { formatStagingFileName } from "../staging";
import { systemClock, type Clock } from "../timing";
import type {
  AudioEncoding,
  SessionContext,
  StagingArea,
  StagingFile,
  VoiceActivityEvent,
  VoiceCaptureProvider,
} from "../types";

export function createTestLogger() {
  return {
    debug: vi.fn<Logger["debug"]>(),
    info: vi.fn<Logger["info"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
  };
}

export function fixedClock(now: number): Clock {
  return { now: () => now, sleep: async () => {} };
}

export function makeContext(overrides: Partial<SessionContext> = {}): SessionContext {
  return {
    sessionId: "guild-1",
    directory: "recordings/guild-1",
    active: true,
    activity: new VoiceActivityTracker(systemClock),
    currentSegment: null,
    ...overrides,
  };
}

/**
 * メモリ上のステージングディレクトリ
 */
export class MemoryStagingArea implements StagingArea {
  readonly files = new Map<string, StagingFile>();
  readonly removed: string[] = [];
  prepared = 0;
  failRemovalOf = new Set<string>();

  add(name: string, sizeBytes: number, modifiedAt: number): StagingFile {
    const file: StagingFile = { path: `recordings/guild-1/${name}`, name, sizeBytes, modifiedAt };
    this.files.set(file.path, file);
    return file;
  }

  async prepare(): Promise<void> {
    this.prepared++;
  }

  async list(): Promise<StagingFile[]> {
    return [...this.files.values()];
  }

  async remove(filePath: string): Promise<void> {
    if (this.failRemovalOf.has(filePath)) {
      throw new Error("EBUSY: resource busy or locked");
    }
    this.files.delete(filePath);
    this.removed.push(filePath);
  }
}

/**
 * 録音プロバイダーのテスト用実装
 * staging を渡すと、停止時に参加者ごとのファイルを書き出したものとして登録する
 */
export class FakeCapture implements VoiceCaptureProvider {
  readonly started: string[] = [];
  stopped = 0;
  connects = 0;
  disconnects = 0;
  failStarts = 0;
  connectError: Error | null = null;
  connectDelayMs = 0;
  participants: string[] = ["42"];
  fileSize = 4096;
  private current: { segmentId: string; encoding: AudioEncoding } | null = null;
  private readonly listeners = new Set<(event: VoiceActivityEvent) => void>();
  private readonly closedListeners = new Set<() => void>();

  constructor(private readonly staging: MemoryStagingArea | null = null) {}

  get listenerCount(): number {
    return this.listeners.size;
  }

  async connect(): Promise<void> {
    this.connects++;
    if (this.connectDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.connectDelayMs));
    }
    if (this.connectError) throw this.connectError;
  }

  async disconnect(): Promise<void> {
    this.disconnects++;
  }

  async startCapture(_directory: string, encoding: AudioEncoding, segmentId: string): Promise<void> {
    if (this.failStarts > 0) {
      this.failStarts--;
      throw new Error("device busy");
    }
    this.current = { segmentId, encoding };
    this.started.push(segmentId);
  }

  async stopCapture(): Promise<string[]> {
    this.stopped++;
    const segment = this.current;
    const staging = this.staging;
    this.current = null;
    if (!segment || !staging) return [];

    return this.participants.map((participantId) => {
      const name = formatStagingFileName({ segmentId: segment.segmentId, participantId, encoding: segment.encoding });
      return staging.add(name, this.fileSize, Date.now()).path;
    });
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

  get closedListenerCount(): number {
    return this.closedListeners.size;
  }

  /** 接続が外部要因で閉じたことを通知 */
  close(): void {
    for (const listener of this.closedListeners) {
      listener();
    }
  }

  emit(event: VoiceActivityEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
