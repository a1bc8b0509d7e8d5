import { TransientCaptureError, describeError } from "./errors";
import type { Logger } from "./logger";
import type { Clock } from "./timing";
import type {
  FinishedSegment,
  RecorderOptions,
  Segment,
  SessionContext,
  VoiceCaptureProvider,
} from "./types";

export interface RecorderTick {
  segmentId: string;
  elapsedMs: number;
  targetDurationMs: number;
  isSpeaking: boolean;
  msSinceLastSpeech: number;
  stop: boolean;
}

export interface SegmentRecorderDeps {
  capture: VoiceCaptureProvider;
  clock: Clock;
  logger: Logger;
  options: RecorderOptions;
  onTick?: (tick: RecorderTick) => void;
}

/**
 * 発話状況に応じて録音セグメントを延長・停止し、次のセグメントへ切り替える
 */
export class SegmentRecorder {
  private sequence = 0;

  constructor(private readonly deps: SegmentRecorderDeps) {}

  /**
   * セッションがアクティブな間、録音サイクルを繰り返す
   */
  async run(ctx: SessionContext): Promise<void> {
    const { clock, logger, options } = this.deps;
    logger.info(`Recording loop started for session ${ctx.sessionId}`);

    while (ctx.active) {
      try {
        await this.runCycle(ctx);
      } catch (error) {
        // 1サイクルの失敗でループは止めない
        logger.error(`Error in recording cycle: ${describeError(error)}`);
        ctx.currentSegment = null;
        await clock.sleep(options.retryBackoffMs);
      }
    }

    logger.info(`Recording loop stopped for session ${ctx.sessionId}`);
  }

  /**
   * 1セグメント分の録音（開始 → 延長/停止の判定 → 書き出し完了まで待機）
   */
  async runCycle(ctx: SessionContext): Promise<FinishedSegment> {
    const { capture, clock, logger, options } = this.deps;
    const segmentId = `${clock.now()}-${++this.sequence}`;

    try {
      await capture.startCapture(ctx.directory, options.encoding, segmentId);
    } catch (error) {
      throw new TransientCaptureError(`Failed to start capture ${segmentId}`, { cause: error });
    }

    const segment: Segment = {
      id: segmentId,
      startedAt: clock.now(),
      targetDurationMs: options.baseDurationMs,
    };
    ctx.currentSegment = segment;
    logger.debug(`Segment ${segmentId} started`);

    // セッション停止時も現在のセグメントは書き出してから抜ける
    while (ctx.active) {
      const tick = this.evaluate(ctx, segment);
      this.deps.onTick?.(tick);
      logger.debug(
        `Segment ${segmentId} | speaking: ${tick.isSpeaking} | elapsed: ${tick.elapsedMs}ms | ` +
          `target: ${tick.targetDurationMs}ms | since last speech: ${tick.msSinceLastSpeech}ms`
      );
      if (tick.stop) break;
      await clock.sleep(options.tickMs);
    }

    let files: string[];
    try {
      files = await capture.stopCapture();
    } catch (error) {
      throw new TransientCaptureError(`Failed to stop capture ${segmentId}`, { cause: error });
    } finally {
      ctx.currentSegment = null;
    }

    const stoppedAt = clock.now();
    logger.info(
      `Stopping recording after ${((stoppedAt - segment.startedAt) / 1000).toFixed(1)} seconds ` +
        `(target: ${(segment.targetDurationMs / 1000).toFixed(1)}s, files: ${files.length})`
    );

    return { ...segment, stoppedAt, files };
  }

  /**
   * 現在の発話状態からセグメントの延長・停止を判定
   */
  private evaluate(ctx: SessionContext, segment: Segment): RecorderTick {
    const { clock, options } = this.deps;
    const elapsedMs = clock.now() - segment.startedAt;
    const { isSpeaking, msSinceLastSpeech } = ctx.activity.snapshot();

    let stop = false;
    if (isSpeaking) {
      // 発話中は途中で切らないよう猶予分だけ延長
      segment.targetDurationMs = Math.max(segment.targetDurationMs, elapsedMs + options.graceMs);
    } else {
      // 短い間（ま）で止めず、最低録音時間にも達している場合のみ停止
      stop = msSinceLastSpeech >= options.silenceHoldMs && elapsedMs >= segment.targetDurationMs;
    }

    return {
      segmentId: segment.id,
      elapsedMs,
      targetDurationMs: segment.targetDurationMs,
      isSpeaking,
      msSinceLastSpeech,
      stop,
    };
  }
}
