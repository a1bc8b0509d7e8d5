import { VoiceActivityTracker } from "./activity";
import { FatalConfigurationError, describeError } from "./errors";
import type { Logger } from "./logger";
import type { ParticipantDirectory } from "./participants";
import { SegmentRecorder, type RecorderTick } from "./recorder";
import { TranscriptionSweeper } from "./sweeper";
import type { Clock } from "./timing";
import type {
  PipelineOptions,
  SessionContext,
  StagingArea,
  TranscriptSink,
  TranscriptionEngine,
  VoiceCaptureProvider,
} from "./types";

export interface SessionControllerDeps {
  sessionId: string;
  directory: string;
  capture: VoiceCaptureProvider;
  staging: StagingArea;
  engine: TranscriptionEngine;
  participants: ParticipantDirectory;
  sink: TranscriptSink;
  clock: Clock;
  logger: Logger;
  options: PipelineOptions;
  onRecorderTick?: (tick: RecorderTick) => void;
  // 音声接続が外部要因で閉じ、セッションが停止した後に呼ばれる
  onConnectionLost?: () => void;
}

/**
 * 録音ループと文字起こしループを1セッションとして起動・停止する
 */
export class SessionController {
  private readonly recorder: SegmentRecorder;
  private readonly sweeper: TranscriptionSweeper;
  private context: SessionContext | null = null;
  private loops: Promise<void> | null = null;
  private unsubscribeActivity: (() => void) | null = null;
  private unsubscribeClosed: (() => void) | null = null;
  // start/stopを直列化するためのチェーン
  private transition: Promise<void> = Promise.resolve();

  constructor(private readonly deps: SessionControllerDeps) {
    this.recorder = new SegmentRecorder({
      capture: deps.capture,
      clock: deps.clock,
      logger: deps.logger,
      options: deps.options.recorder,
      onTick: deps.onRecorderTick,
    });
    this.sweeper = new TranscriptionSweeper({
      staging: deps.staging,
      engine: deps.engine,
      participants: deps.participants,
      sink: deps.sink,
      clock: deps.clock,
      logger: deps.logger,
      options: deps.options.sweeper,
    });
  }

  get isActive(): boolean {
    return this.context?.active ?? false;
  }

  get currentContext(): SessionContext | null {
    return this.context;
  }

  /**
   * セッションを開始（アクティブなら再起動）
   * 実行中のstart/stopがあれば、その完了を待ってから実行する
   */
  start(): Promise<void> {
    return this.enqueue(() => this.startNow());
  }

  /**
   * セッションを停止（未開始なら何もしない）
   */
  stop(): Promise<void> {
    return this.enqueue(() => this.stopNow());
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    const run = this.transition.then(task);
    // 失敗は呼び出し元に返し、チェーンは次の操作のために継続する
    this.transition = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async startNow(): Promise<void> {
    const { capture, staging, clock, logger } = this.deps;

    // 前回のループが終了してから新しいループを起動する
    if (this.context?.active) {
      logger.info(`Session ${this.deps.sessionId} is already active, restarting`);
      await this.halt();
    }

    try {
      await staging.prepare();
      await capture.connect();
    } catch (error) {
      this.context = null;
      if (error instanceof FatalConfigurationError) throw error;
      throw new FatalConfigurationError(`Failed to start session ${this.deps.sessionId}`, { cause: error });
    }

    const ctx: SessionContext = {
      sessionId: this.deps.sessionId,
      directory: this.deps.directory,
      active: true,
      activity: new VoiceActivityTracker(clock),
      currentSegment: null,
    };
    this.unsubscribeActivity = capture.onActivity((event) => ctx.activity.onActivity(event.speaking));
    this.unsubscribeClosed = capture.onClosed(() => this.handleConnectionLost(ctx));
    this.context = ctx;

    this.loops = Promise.all([this.recorder.run(ctx), this.sweeper.run(ctx)])
      .then(() => undefined)
      .catch((error: unknown) => {
        logger.error(`Session loop crashed: ${describeError(error)}`);
      });

    logger.info(`Session ${ctx.sessionId} started (staging: ${ctx.directory})`);
  }

  private async stopNow(): Promise<void> {
    const ctx = this.context;
    if (!ctx) return;

    await this.halt();

    // 最後のセグメントを含め、残ったファイルを処理
    try {
      const report = await this.sweeper.drain(ctx);
      this.deps.logger.debug(`Drained staging area`, report);
    } catch (error) {
      this.deps.logger.error(`Failed to drain staging area: ${describeError(error)}`);
    }

    try {
      await this.deps.capture.disconnect();
    } catch (error) {
      this.deps.logger.error(`Failed to disconnect: ${describeError(error)}`);
    }

    this.context = null;
    this.deps.logger.info(`Session ${ctx.sessionId} stopped`);
  }

  /**
   * 再接続できずに音声接続が閉じた場合はセッションを停止して通知
   */
  private handleConnectionLost(ctx: SessionContext): void {
    const { logger } = this.deps;
    if (this.context !== ctx || !ctx.active) return;

    logger.warn(`Voice connection closed, stopping session ${ctx.sessionId}`);
    this.stop()
      .then(() => this.deps.onConnectionLost?.())
      .catch((error: unknown) => {
        logger.error(`Failed to stop session after connection loss: ${describeError(error)}`);
      });
  }

  /**
   * アクティブフラグを下ろし、両ループの終了を待つ
   */
  private async halt(): Promise<void> {
    const ctx = this.context;
    if (ctx) ctx.active = false;

    await this.deps.clock.sleep(this.deps.options.sessionSettleMs);
    await this.loops;
    this.loops = null;

    this.unsubscribeActivity?.();
    this.unsubscribeActivity = null;
    this.unsubscribeClosed?.();
    this.unsubscribeClosed = null;
  }
}
