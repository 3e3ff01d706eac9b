import type { SessionAdapter, SessionLoadError, SessionLoadResult } from '../../../src/adapters/session/SessionAdapter.js';
import type { RawSession } from '../../../src/core/types.js';

export class MockSessionAdapter implements SessionAdapter {
  name = 'mock-session';
  sessions: RawSession[] = [];
  errors: SessionLoadError[] = [];
  availableFlag = true;
  failure: Error | null = null;

  constructor(sessions: RawSession[] = []) {
    this.sessions = sessions;
  }

  async isAvailable(): Promise<boolean> {
    return this.availableFlag;
  }

  async getSessions(): Promise<SessionLoadResult> {
    if (this.failure) {
      throw this.failure;
    }
    return { sessions: [...this.sessions], errors: [...this.errors] };
  }

  setAvailable(available: boolean): void {
    this.availableFlag = available;
  }

  addSessions(sessions: RawSession[]): void {
    this.sessions.push(...sessions);
  }

  addError(error: SessionLoadError): void {
    this.errors.push(error);
  }

  failWith(error: Error): void {
    this.failure = error;
  }
}
