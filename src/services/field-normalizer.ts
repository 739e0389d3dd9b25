import { fail, ok, type HouseStatus, type Result } from '../types';

/**
 * Field normalization: pure text-to-value conversions for listing cells.
 * Nothing here touches the DOM or throws; every failure is a reason string
 * the caller attaches to the owning row.
 */

const MULTIPLIERS: Record<string, number> = {
  '': 1,
  k: 1_000,
  kk: 1_000_000,
};

// "1,500", "1.500", "1 500" or plain digits; optional k/kk; optional unit word
const AMOUNT_PATTERN = /^(\d{1,3}(?:([,. ])\d{3})(?:\2\d{3})*|\d+)\s*(k{0,2})(?:\s+[a-z]+)?$/i;

export function sanitizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Parse a displayed amount such as "20 sqm", "1,500 gold" or "50k gold".
 */
export function parseAmount(raw: string): Result<number, string> {
  const text = sanitizeText(raw);
  const match = text.match(AMOUNT_PATTERN);
  if (!match) {
    return fail(`NumericFormat: "${text}" is not a non-negative integer`);
  }

  const digits = match[1].replace(/[,. ]/g, '');
  const multiplier = MULTIPLIERS[match[3].toLowerCase()] ?? 1;
  const value = parseInt(digits, 10) * multiplier;

  if (!Number.isSafeInteger(value)) {
    return fail(`NumericFormat: "${text}" is out of range`);
  }
  return ok(value);
}

export function formatAmount(value: number, separator = ','): string {
  return String(value).replace(/\B(?=(\d{3})+(?!\d))/g, separator);
}

export interface Countdown {
  seconds: number;
  unit: 'day' | 'hour' | 'minute' | 'finished';
}

const UNIT_SECONDS: Record<Exclude<Countdown['unit'], 'finished'>, number> = {
  day: 86_400,
  hour: 3_600,
  minute: 60,
};

function toCountdownUnit(word: string): keyof typeof UNIT_SECONDS {
  if (word === 'day') return 'day';
  if (word === 'hour') return 'hour';
  return 'minute';
}

const TERMINAL_COUNTDOWNS = new Set(['finished', 'ended', 'auction ended', 'auction finished']);

/**
 * "3 days left" → 259200 seconds. A finished auction is a terminal zero.
 */
export function parseCountdown(raw: string): Result<Countdown, string> {
  const text = sanitizeText(raw).toLowerCase();
  if (TERMINAL_COUNTDOWNS.has(text)) {
    return ok({ seconds: 0, unit: 'finished' });
  }

  const match = text.match(/^(\d+) (day|hour|minute)s? left$/);
  if (!match) {
    return fail(`UnknownCountdown: "${text}"`);
  }

  const unit = toCountdownUnit(match[2]);
  return ok({ seconds: parseInt(match[1], 10) * UNIT_SECONDS[unit], unit });
}

// Server save, when day-based auctions end
const SERVER_SAVE_HOUR_UTC = 8;

/**
 * Day countdowns end at server save of the target day; shorter ones are
 * rounded up to the next full hour, since the page only shows whole units.
 */
export function auctionExpiry(countdown: Countdown, now: Date): Date {
  const base = new Date(now.getTime());
  base.setUTCMinutes(0, 0, 0);

  if (countdown.unit === 'day') {
    base.setUTCHours(SERVER_SAVE_HOUR_UTC);
  } else if (countdown.unit !== 'finished') {
    base.setUTCHours(base.getUTCHours() + 1);
  }

  return new Date(base.getTime() + countdown.seconds * 1000);
}

const AUCTION_PATTERN = /^auctioned \((.+?) gold; (.+)\)$/;

/**
 * Map the status cell to a HouseStatus. The vocabulary is closed: an unseen
 * phrase is an error, never a default.
 */
export function parseStatus(raw: string, now: Date): Result<HouseStatus, string> {
  const text = sanitizeText(raw).toLowerCase();

  if (text === 'rented') return ok({ type: 'rented' });
  if (text === 'auctioned (no bid yet)') return ok({ type: 'auctionNoBid' });

  const match = text.match(AUCTION_PATTERN);
  if (!match) {
    return fail(`UnknownStatus: "${text}"`);
  }

  const bid = parseAmount(match[1]);
  if (!bid.ok) return fail(`Invalid bid in status "${text}": ${bid.error}`);

  const countdown = parseCountdown(match[2]);
  if (!countdown.ok) return fail(`Invalid countdown in status "${text}": ${countdown.error}`);

  if (countdown.value.unit === 'finished') {
    return ok({ type: 'auctionFinished', bid: bid.value, timeRemainingSeconds: 0 });
  }

  return ok({
    type: 'auctionWithBid',
    bid: bid.value,
    timeRemainingSeconds: countdown.value.seconds,
    expiryTime: auctionExpiry(countdown.value, now),
  });
}
