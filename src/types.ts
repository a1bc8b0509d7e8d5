import type { VoiceActivityTracker } from "./activity";

// 録音ファイルの形式（pcmは文字起こし時にWAVヘッダーを付与する）
export type AudioEncoding = "wav" | "pcm";

// ボイスアクティビティイベント（speakingは「このイベント後も誰かが話しているか」）
export interface VoiceActivityEvent {
  participantId: string;
  speaking: boolean;
}

export interface VoiceActivityState {
  isSpeaking: boolean;
  lastSpeechTimestamp: number; // 最後に発話を観測した時刻（ms）
}

export interface VoiceActivitySnapshot {
  isSpeaking: boolean;
  msSinceLastSpeech: number;
}

// 録音中のセグメント（確定までSegmentRecorderが所有）
export interface Segment {
  id: string;
  startedAt: number;
  targetDurationMs: number;
}

export interface FinishedSegment extends Segment {
  stoppedAt: number;
  files: string[]; // ステージングディレクトリに書き出されたファイル
}

// ステージングディレクトリ内の確定済みファイル
export interface StagingFile {
  path: string;
  name: string;
  sizeBytes: number;
  modifiedAt: number;
}

export interface TranscriptEvent {
  participantId: string;
  displayName: string;
  text: string;
  timestamp: Date;
}

// セッションごとの共有状態（録音ループと文字起こしループに渡される）
export interface SessionContext {
  sessionId: string;
  directory: string;
  active: boolean;
  activity: VoiceActivityTracker;
  currentSegment: Segment | null;
}

export interface VoiceCaptureProvider {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  startCapture(directory: string, encoding: AudioEncoding, segmentId: string): Promise<void>;
  /** 書き込みが完了したファイルのパスを返す */
  stopCapture(): Promise<string[]>;
  onActivity(listener: (event: VoiceActivityEvent) => void): () => void;
  /** disconnect()を経由せずに接続が閉じたときに呼ばれる */
  onClosed(listener: () => void): () => void;
}

// 文字起こしエンジンに渡すオプション（認識するすべての項目を列挙）
export interface TranscriptionOptions {
  model: string;
  language: string;
  smartFormat: boolean;
  punctuate: boolean;
  fillerWords: boolean;
  minConfidence: number; // これ未満の信頼度の結果は空として扱う
}

export interface TranscriptionResult {
  text: string;
  confidence: number | null;
}

export interface TranscriptionEngine {
  transcribe(filePath: string, options: TranscriptionOptions): Promise<TranscriptionResult>;
}

export interface ParticipantNameResolver {
  resolve(participantId: string, sessionId: string): Promise<string>;
}

export interface TranscriptSink {
  emit(event: TranscriptEvent): void;
}

export interface StagingArea {
  prepare(): Promise<void>;
  list(): Promise<StagingFile[]>;
  remove(filePath: string): Promise<void>;
}

export interface RecorderOptions {
  baseDurationMs: number;
  graceMs: number;
  silenceHoldMs: number;
  tickMs: number;
  retryBackoffMs: number;
  encoding: AudioEncoding;
}

export interface SweeperOptions {
  tickMs: number;
  settleMs: number;
  minBytes: number;
  transcriptionTimeoutMs: number;
  transcription: TranscriptionOptions;
}

export interface PipelineOptions {
  recorder: RecorderOptions;
  sweeper: SweeperOptions;
  sessionSettleMs: number;
}
