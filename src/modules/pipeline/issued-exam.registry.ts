import { createHash } from 'node:crypto';
import type { Exam, SessionMode } from '../../common/types.js';

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, entry]) => entry !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, entry]) => [key, canonicalize(entry)]),
    );
  }
  return value;
}

/** SHA-256 of the exam's JSON with object keys sorted. */
export function fingerprintExam(exam: Exam): string {
  return createHash('sha256').update(JSON.stringify(canonicalize(exam))).digest('hex');
}

interface IssuedExam {
  fingerprint: string;
  mode: SessionMode;
  pending: boolean;
}

export type IssuedExamCheck = { ok: true; fingerprint: string } | { ok: false; reason: string };

export const DEFAULT_MAX_TRACKED_USERS = 10_000;

/**
 * Process-local record of exams handed out by `start`, per user. Keeps the
 * newest `limitPerUser` entries per user and the `maxUsers` most recently
 * active users.
 */
export class IssuedExamRegistry {
  private readonly issued = new Map<string, IssuedExam[]>();

  constructor(
    private readonly limitPerUser: number,
    private readonly maxUsers: number = DEFAULT_MAX_TRACKED_USERS,
  ) {}

  record(userKey: string, mode: SessionMode, exam: Exam): string {
    const fingerprint = fingerprintExam(exam);
    const entries = (this.issued.get(userKey) ?? []).filter(entry => entry.fingerprint !== fingerprint);
    entries.push({ fingerprint, mode, pending: false });
    this.issued.delete(userKey);
    this.issued.set(userKey, entries.slice(-Math.max(1, this.limitPerUser)));
    for (const stale of this.issued.keys()) {
      if (this.issued.size <= Math.max(1, this.maxUsers)) break;
      this.issued.delete(stale);
    }
    return fingerprint;
  }

  check(userKey: string, mode: SessionMode, exam: Exam): IssuedExamCheck {
    const fingerprint = fingerprintExam(exam);
    const entry = this.find(userKey, fingerprint);
    if (!entry) {
      return { ok: false, reason: 'exam was not issued to this user or was already submitted' };
    }
    if (entry.mode !== mode) {
      return { ok: false, reason: `exam was issued for ${entry.mode} mode, not ${mode}` };
    }
    if (entry.pending) {
      return { ok: false, reason: 'exam submission is already in progress' };
    }
    return { ok: true, fingerprint };
  }

  /** Checks the exam and holds it for one submission until `consume` or `release`. */
  reserve(userKey: string, mode: SessionMode, exam: Exam): IssuedExamCheck {
    const result = this.check(userKey, mode, exam);
    if (result.ok) {
      const entry = this.find(userKey, result.fingerprint);
      if (entry) entry.pending = true;
    }
    return result;
  }

  release(userKey: string, fingerprint: string): void {
    const entry = this.find(userKey, fingerprint);
    if (entry) entry.pending = false;
  }

  consume(userKey: string, fingerprint: string): void {
    const entries = this.issued.get(userKey);
    if (!entries) return;
    const remaining = entries.filter(entry => entry.fingerprint !== fingerprint);
    if (remaining.length > 0) {
      this.issued.set(userKey, remaining);
    } else {
      this.issued.delete(userKey);
    }
  }

  size(userKey: string): number {
    return this.issued.get(userKey)?.length ?? 0;
  }

  get trackedUsers(): number {
    return this.issued.size;
  }

  private find(userKey: string, fingerprint: string): IssuedExam | undefined {
    return this.issued.get(userKey)?.find(candidate => candidate.fingerprint === fingerprint);
  }
}
