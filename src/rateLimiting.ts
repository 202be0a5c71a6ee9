import * as admin from 'firebase-admin';
import * as functions from 'firebase-functions/v1';

// Rate limits per user per feature
export const RATE_LIMITS = {
  translation: { minute: 10, hour: 200, day: 1000 },
  insights: { minute: 5, hour: 50, day: 200 },
  search: { minute: 10, hour: 100, day: 500 },
  embedding: { minute: 20, hour: 200, day: 1000 },
};

export type RateLimitFeature = keyof typeof RATE_LIMITS;

type RateWindow = 'minute' | 'hour' | 'day';

const WINDOW_MS: Record<RateWindow, number> = {
  minute: 60_000,
  hour: 3_600_000,
  day: 86_400_000,
};

// most restrictive first, so a blocked minute skips the other reads
const WINDOWS: RateWindow[] = ['minute', 'hour', 'day'];

export interface RateLimitCheck {
  allowed: boolean;
  remaining: number;
  resetAt: number;
  retryAfter: number; // seconds
}

function windowKey(userId: string, feature: RateLimitFeature, window: RateWindow, now: number): string {
  return `${userId}_${feature}_${window}_${Math.floor(now / WINDOW_MS[window])}`;
}

function windowReset(window: RateWindow, now: number): number {
  return (Math.floor(now / WINDOW_MS[window]) + 1) * WINDOW_MS[window];
}

/**
 * Fixed-window counters in Firestore, checked minute, then hour, then day.
 *
 * @param userId - Caller to check
 * @param feature - Feature whose limits apply (translation, search, etc.)
 * @param now - Current time in ms; windows are aligned to it
 * @returns Whether the call may proceed, and when the blocking window resets
 */
export async function checkRateLimit(
  userId: string,
  feature: RateLimitFeature,
  now = Date.now()
): Promise<RateLimitCheck> {
  const db = admin.firestore();
  const limits = RATE_LIMITS[feature];
  let remaining = Number.POSITIVE_INFINITY;

  for (const window of WINDOWS) {
    const doc = await db.collection('rateLimits').doc(windowKey(userId, feature, window, now)).get();
    const count: unknown = doc.exists ? doc.data()?.count : 0;
    const used = typeof count === 'number' ? count : 0;

    if (used >= limits[window]) {
      const resetAt = windowReset(window, now);
      return { allowed: false, remaining: 0, resetAt, retryAfter: Math.ceil((resetAt - now) / 1000) };
    }
    remaining = Math.min(remaining, limits[window] - used);
  }

  return { allowed: true, remaining, resetAt: windowReset('minute', now), retryAfter: 0 };
}

/**
 * Call after the guarded request succeeds. All windows move together.
 *
 * @param userId - Caller whose usage is recorded
 * @param feature - Feature that was used
 */
export async function incrementRateLimit(userId: string, feature: RateLimitFeature, now = Date.now()): Promise<void> {
  const db = admin.firestore();
  const batch = db.batch();

  for (const window of WINDOWS) {
    batch.set(
      db.collection('rateLimits').doc(windowKey(userId, feature, window, now)),
      { count: admin.firestore.FieldValue.increment(1), timestamp: now },
      { merge: true }
    );
  }

  await batch.commit();
}

/**
 * Throws `resource-exhausted` with `{ retryAfter, resetAt }` when over the limit.
 */
export async function rateLimitMiddleware(userId: string, feature: RateLimitFeature): Promise<void> {
  const check = await checkRateLimit(userId, feature);

  if (!check.allowed) {
    console.warn(`⚠️ Rate limit hit: ${userId} ${feature}, retry in ${check.retryAfter}s`);
    throw new functions.https.HttpsError(
      'resource-exhausted',
      `Rate limit exceeded for ${feature}. Try again in ${check.retryAfter} seconds.`,
      { retryAfter: check.retryAfter, resetAt: check.resetAt }
    );
  }
}
