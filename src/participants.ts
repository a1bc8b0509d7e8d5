import { LookupError, describeError } from "./errors";
import type { Logger } from "./logger";
import type { ParticipantNameResolver } from "./types";

export function fallbackDisplayName(participantId: string): string {
  return `User_${participantId}`;
}

/**
 * 参加者IDから表示名を取得（キャッシュ付き、失敗時はフォールバック名）
 */
export class ParticipantDirectory {
  private readonly cache = new Map<string, string>();

  constructor(
    private readonly resolver: ParticipantNameResolver,
    private readonly logger: Logger
  ) {}

  async displayName(participantId: string, sessionId: string): Promise<string> {
    const cacheKey = `${participantId}_${sessionId}`;
    const cached = this.cache.get(cacheKey);
    if (cached !== undefined) {
      return cached;
    }

    try {
      const name = await this.resolver.resolve(participantId, sessionId);
      this.cache.set(cacheKey, name);
      return name;
    } catch (error) {
      const lookupError =
        error instanceof LookupError
          ? error
          : new LookupError(`Error fetching username for ${participantId}`, { cause: error });
      // フォールバック名はキャッシュしない（次回また解決を試みる）
      this.logger.warn(describeError(lookupError));
      return fallbackDisplayName(participantId);
    }
  }

  clear(): void {
    this.cache.clear();
  }
}
