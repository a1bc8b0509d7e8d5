import { systemClock, type Clock } from "./timing";
import type { VoiceActivitySnapshot, VoiceActivityState } from "./types";

/**
 * 発話状態を保持する（最新のイベントが常に優先される）
 */
export class VoiceActivityTracker {
  private state: VoiceActivityState;

  constructor(private readonly clock: Clock = systemClock) {
    this.state = { isSpeaking: false, lastSpeechTimestamp: clock.now() };
  }

  onActivity(isSpeaking: boolean): void {
    const now = this.clock.now();
    const wasSpeaking = this.state.isSpeaking;

    // 発話中、または発話が終わった瞬間を「最後の発話」として記録
    this.state = {
      isSpeaking,
      lastSpeechTimestamp: isSpeaking || wasSpeaking ? now : this.state.lastSpeechTimestamp,
    };
  }

  snapshot(): VoiceActivitySnapshot {
    const { isSpeaking, lastSpeechTimestamp } = this.state;
    return {
      isSpeaking,
      msSinceLastSpeech: Math.max(0, this.clock.now() - lastSpeechTimestamp),
    };
  }
}
