// src/calls/sessionState.ts
// State shared by the inbound and outbound pumps of one session. Every transition is a
// synchronous method, so each one completes within a single event-loop turn.

export type AgentAudioDecision = 'started' | 'continuing' | 'stale';

export type SessionStateSnapshot = {
  isAgentSpeaking: boolean;
  lastAudioActivityAt: number | null;
  lastEndOfTurnSentAt: number | null;
  turnEnded: boolean;
  userSpeaking: boolean;
  interruptionEpoch: number;
};

export class SessionState {
  private isAgentSpeaking = false;
  private lastAudioActivityAt: number | null = null;
  private lastEndOfTurnSentAt: number | null = null;
  private turnEnded = false;
  private userSpeaking = false;
  private interruptionEpoch = 0;

  /** Captured by the outbound pump before it awaits anything for a chunk. */
  public currentEpoch(): number {
    return this.interruptionEpoch;
  }

  /**
   * Outbound: called right before agent audio goes to the transport. Refuses audio that
   * was in flight when the caller barged in, so an interruption is never undone.
   */
  public beginAgentAudio(epoch: number): AgentAudioDecision {
    if (epoch !== this.interruptionEpoch) {
      return 'stale';
    }
    if (this.isAgentSpeaking) {
      return 'continuing';
    }
    this.isAgentSpeaking = true;
    return 'started';
  }

  /** Inbound: caller speech while the agent talks. Returns whether playback was active. */
  public interrupt(): boolean {
    const wasSpeaking = this.isAgentSpeaking;
    this.isAgentSpeaking = false;
    if (wasSpeaking) {
      this.interruptionEpoch += 1;
    }
    return wasSpeaking;
  }

  /** Outbound: the model finished or abandoned its turn. */
  public endAgentTurn(): boolean {
    const wasSpeaking = this.isAgentSpeaking;
    this.isAgentSpeaking = false;
    return wasSpeaking;
  }

  public markAudioActivity(ts: number): void {
    this.lastAudioActivityAt = ts;
  }

  public markUserSpeechStarted(): void {
    this.userSpeaking = true;
    this.turnEnded = false;
  }

  public markEndOfTurnSent(ts: number): void {
    this.userSpeaking = false;
    this.turnEnded = true;
    this.lastEndOfTurnSentAt = ts;
  }

  /** Latency from the last end-of-turn to `ts`; consumed once per turn. */
  public takeResponseLatency(ts: number): number | null {
    if (this.lastEndOfTurnSentAt === null) {
      return null;
    }
    const latency = ts - this.lastEndOfTurnSentAt;
    this.lastEndOfTurnSentAt = null;
    return latency;
  }

  /** Whether an open user turn has gone without audio for at least `silenceMs`. */
  public silenceFallbackDue(now: number, silenceMs: number): boolean {
    if (!this.userSpeaking || this.turnEnded || this.lastAudioActivityAt === null) {
      return false;
    }
    return now - this.lastAudioActivityAt >= silenceMs;
  }

  public snapshot(): SessionStateSnapshot {
    return {
      isAgentSpeaking: this.isAgentSpeaking,
      lastAudioActivityAt: this.lastAudioActivityAt,
      lastEndOfTurnSentAt: this.lastEndOfTurnSentAt,
      turnEnded: this.turnEnded,
      userSpeaking: this.userSpeaking,
      interruptionEpoch: this.interruptionEpoch,
    };
  }
}
