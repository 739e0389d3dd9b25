import {
  fail,
  ok,
  type ExtractionResult,
  type House,
  type HouseField,
  type ListingRequest,
  type RawHouseRow,
  type Result,
  type RowFailure,
} from '../types';
import { parseAmount, parseStatus } from './field-normalizer';

export interface RowOutcome {
  row: number;
  result: Result<House, RowFailure>;
}

function invalid(row: number, field: HouseField, reason: string): Result<House, RowFailure> {
  const failure: RowFailure = { row, kind: 'fieldInvalid', field, reason };
  return fail(failure);
}

function positiveAmount(text: string): Result<number, string> {
  const amount = parseAmount(text);
  if (!amount.ok) return amount;
  if (amount.value <= 0) return fail(`must be positive, got ${amount.value}`);
  return amount;
}

/**
 * Normalize one raw row into a House. Fields are checked in column order and
 * the first invalid one is reported.
 */
export function buildHouse(
  raw: RawHouseRow,
  request: ListingRequest,
  now: Date
): Result<House, RowFailure> {
  const { row, cells } = raw;

  const id = /^\d+$/.test(cells.id) ? parseInt(cells.id, 10) : NaN;
  if (!Number.isSafeInteger(id) || id <= 0) {
    return invalid(row, 'id', `"${cells.id}" is not a positive integer id`);
  }
  if (cells.name.length === 0) {
    return invalid(row, 'name', 'name is empty');
  }

  const size = positiveAmount(cells.size);
  if (!size.ok) return invalid(row, 'size', size.error);

  const rent = positiveAmount(cells.rent);
  if (!rent.ok) return invalid(row, 'rent', rent.error);

  const status = parseStatus(cells.status, now);
  if (!status.ok) return invalid(row, 'status', status.error);

  return ok({
    id,
    world: request.world,
    town: request.town,
    type: request.type,
    name: cells.name,
    size: size.value,
    rent: rent.value,
    status: status.value,
  });
}

/**
 * Countdowns of a result stored `elapsedSeconds` ago, as they read now.
 */
export function ageResult(result: ExtractionResult, elapsedSeconds: number): ExtractionResult {
  const houses = result.houses.map((house): House => {
    if (house.status.type !== 'auctionWithBid') return house;
    const timeRemainingSeconds = Math.max(0, house.status.timeRemainingSeconds - elapsedSeconds);
    return { ...house, status: { ...house.status, timeRemainingSeconds } };
  });
  return { ...result, houses };
}

/**
 * Fold row outcomes into an ExtractionResult. A repeated id fails the later
 * row; the first occurrence is kept. Never throws.
 */
export function assembleResult(request: ListingRequest, outcomes: RowOutcome[]): ExtractionResult {
  const houses: House[] = [];
  const failures: RowFailure[] = [];
  const seen = new Map<number, number>();

  for (const { row, result } of outcomes) {
    if (!result.ok) {
      failures.push(result.error);
      continue;
    }

    const firstRow = seen.get(result.value.id);
    if (firstRow !== undefined) {
      failures.push({
        row,
        kind: 'duplicateId',
        field: 'id',
        reason: `House id ${result.value.id} already listed in row ${firstRow}`,
      });
      continue;
    }

    seen.set(result.value.id, row);
    houses.push(result.value);
  }

  return {
    world: request.world,
    town: request.town,
    type: request.type,
    houses,
    failures,
    rowCount: outcomes.length,
    empty: houses.length === 0,
  };
}
