import { readFile } from "fs/promises";
import { createClient, type DeepgramClient } from "@deepgram/sdk";
import { pcmToWav } from "./audio";
import { TransientTranscriptionError } from "./errors";
import type { Logger } from "./logger";
import type { TranscriptionEngine, TranscriptionOptions, TranscriptionResult } from "./types";

/**
 * Deepgramの事前録音APIでセグメントファイルを文字起こしする
 */
export class DeepgramTranscriptionEngine implements TranscriptionEngine {
  private readonly deepgram: DeepgramClient;

  constructor(apiKey: string, private readonly logger: Logger) {
    this.deepgram = createClient(apiKey);
    logger.info(`Client created (API key: ${apiKey.substring(0, 8)}...)`);
  }

  async transcribe(filePath: string, options: TranscriptionOptions): Promise<TranscriptionResult> {
    const raw = await readFile(filePath);
    // 生PCMはWAVヘッダーを付けて送信
    const audio = filePath.endsWith(".pcm") ? pcmToWav(raw) : raw;

    const response = await this.deepgram.listen.prerecorded.transcribeFile(audio, {
      model: options.model,
      language: options.language,
      smart_format: options.smartFormat,
      punctuate: options.punctuate,
      filler_words: options.fillerWords,
    });

    if (response.result === null) {
      throw new TransientTranscriptionError(
        `Deepgram request failed: ${response.error?.message ?? "unknown error"}`,
        { cause: response.error }
      );
    }

    const alternative = response.result.results.channels[0]?.alternatives[0];
    if (!alternative) {
      return { text: "", confidence: null };
    }

    this.logger.debug(
      `Transcript for ${filePath} (confidence: ${alternative.confidence}): "${alternative.transcript}"`
    );

    // 信頼度が低い結果は無音・雑音とみなす
    if (alternative.confidence < options.minConfidence) {
      return { text: "", confidence: alternative.confidence };
    }

    return { text: alternative.transcript, confidence: alternative.confidence };
  }
}
