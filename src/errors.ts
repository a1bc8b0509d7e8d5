/**
 * ボイス文字起こしパイプラインのエラー基底クラス
 */
export class VoiceTranscriberError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

// 録音の開始・停止に失敗（バックオフ後に次のサイクルで再試行）
export class TransientCaptureError extends VoiceTranscriberError {}

// 1ファイルの文字起こしに失敗（ファイルは削除され、再試行しない）
export class TransientTranscriptionError extends VoiceTranscriberError {}

// 参加者名の解決に失敗（User_<id> にフォールバック）
export class LookupError extends VoiceTranscriberError {}

// 設定不備・接続不可など、セッション開始（または起動）を中止するエラー
export class FatalConfigurationError extends VoiceTranscriberError {}

/**
 * ログ出力用にエラーメッセージを取り出す（causeも連結）
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  if (error.cause !== undefined) {
    return `${error.message} (cause: ${describeError(error.cause)})`;
  }
  return error.message;
}
