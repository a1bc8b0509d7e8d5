import { TransientTranscriptionError, describeError } from "./errors";
import type { Logger } from "./logger";
import type { ParticipantDirectory } from "./participants";
import { parseStagingFileName } from "./staging";
import { withTimeout, type Clock } from "./timing";
import type {
  SessionContext,
  StagingArea,
  StagingFile,
  SweeperOptions,
  TranscriptSink,
  TranscriptionEngine,
} from "./types";

export interface SweepReport {
  emitted: number; // 文字起こし結果を送信した
  empty: number; // 文字起こし結果が空だった
  skipped: number; // 書き込み中の可能性があるため次回に持ち越し
  discarded: number; // サイズ不足・ファイル名不正で文字起こしせずに削除
  failed: number;
}

export interface TranscriptionSweeperDeps {
  staging: StagingArea;
  engine: TranscriptionEngine;
  participants: ParticipantDirectory;
  sink: TranscriptSink;
  clock: Clock;
  logger: Logger;
  options: SweeperOptions;
}

type FileOutcome = "emitted" | "empty" | "discarded" | "failed";

/**
 * ステージングディレクトリを定期的に走査し、確定したファイルを文字起こしして削除する
 */
export class TranscriptionSweeper {
  constructor(private readonly deps: TranscriptionSweeperDeps) {}

  async run(ctx: SessionContext): Promise<void> {
    const { clock, logger, options } = this.deps;
    logger.info(`Starting continuous processing for session ${ctx.sessionId}`);

    while (ctx.active) {
      try {
        const report = await this.sweepOnce(ctx);
        if (report.emitted + report.empty + report.discarded + report.failed > 0) {
          logger.debug(`Sweep finished`, report);
        }
      } catch (error) {
        logger.error(`Error in continuous processing: ${describeError(error)}`);
      }
      await clock.sleep(options.tickMs);
    }

    logger.info(`Continuous processing stopped for session ${ctx.sessionId}`);
  }

  /**
   * ステージングディレクトリを1回走査
   */
  async sweepOnce(ctx: SessionContext): Promise<SweepReport> {
    return this.sweep(ctx, false);
  }

  /**
   * 録音停止後に残ったファイルをすべて処理（経過時間・発話中の判定は行わない）
   */
  async drain(ctx: SessionContext): Promise<SweepReport> {
    return this.sweep(ctx, true);
  }

  private async sweep(ctx: SessionContext, force: boolean): Promise<SweepReport> {
    const { staging, clock, options } = this.deps;
    const report: SweepReport = { emitted: 0, empty: 0, skipped: 0, discarded: 0, failed: 0 };
    const files = await staging.list();

    for (const file of files) {
      if (!force && !ctx.active) break;

      const ageMs = clock.now() - file.modifiedAt;
      // 録音側がまだ書き込んでいる可能性があるファイルは次回に回す
      if (!force && (ageMs < options.settleMs || ctx.activity.snapshot().isSpeaking)) {
        report.skipped++;
        continue;
      }

      const outcome = await this.processFile(ctx, file, ageMs);
      report[outcome]++;
    }

    return report;
  }

  private async processFile(ctx: SessionContext, file: StagingFile, ageMs: number): Promise<FileOutcome> {
    const { engine, participants, sink, logger, options } = this.deps;

    try {
      if (file.sizeBytes <= options.minBytes) {
        logger.debug(`Discarding ${file.name} (size: ${file.sizeBytes} bytes)`);
        return "discarded";
      }

      const parsed = parseStagingFileName(file.name);
      if (!parsed) {
        logger.warn(`Discarding ${file.name}: participant id cannot be recovered from file name`);
        return "discarded";
      }

      logger.info(`Processing file ${file.name} (age: ${ageMs}ms, size: ${file.sizeBytes})`);
      const result = await withTimeout(
        engine.transcribe(file.path, options.transcription).catch((error: unknown) => {
          throw new TransientTranscriptionError(`Transcription failed for ${file.name}`, { cause: error });
        }),
        options.transcriptionTimeoutMs,
        () =>
          new TransientTranscriptionError(
            `Transcription timed out after ${options.transcriptionTimeoutMs}ms for ${file.name}`
          )
      );

      const text = result.text.trim();
      if (!text) {
        return "empty";
      }

      const displayName = await participants.displayName(parsed.participantId, ctx.sessionId);
      sink.emit({
        participantId: parsed.participantId,
        displayName,
        text,
        timestamp: new Date(this.deps.clock.now()),
      });
      return "emitted";
    } catch (error) {
      logger.error(`Error processing file ${file.name}: ${describeError(error)}`);
      return "failed";
    } finally {
      // 成否にかかわらず削除（ステージングディレクトリの肥大化を防ぐ）
      await this.discard(file);
    }
  }

  private async discard(file: StagingFile): Promise<void> {
    try {
      await this.deps.staging.remove(file.path);
    } catch (error) {
      this.deps.logger.error(`Failed to delete ${file.name}: ${describeError(error)}`);
    }
  }
}
