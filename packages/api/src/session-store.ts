export interface Session {
  /** Value of the session header, or null for an anonymous caller */
  id: string | null;
  isAdmin: boolean;
}

/**
 * Admin unlock state per browser session, held in process memory.
 * Only unlocked sessions are stored; locking forgets the session.
 */
export class SessionStore {
  private unlocked = new Set<string>();

  resolve(id: string | null | undefined): Session {
    const sessionId = id?.trim() || null;
    return {
      id: sessionId,
      isAdmin: sessionId !== null && this.unlocked.has(sessionId),
    };
  }

  unlock(id: string): Session {
    this.unlocked.add(id);
    return { id, isAdmin: true };
  }

  lock(id: string): Session {
    this.unlocked.delete(id);
    return { id, isAdmin: false };
  }

  get size(): number {
    return this.unlocked.size;
  }
}
