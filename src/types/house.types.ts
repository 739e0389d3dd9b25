/**
 * House Listing Types
 */

export type ResidenceType = 'house' | 'guildhall';

export const RESIDENCE_TYPES: readonly ResidenceType[] = ['house', 'guildhall'];

export interface ListingRequest {
  world: string;
  town: string;
  type: ResidenceType;
}

export type HouseStatus =
  | { type: 'rented' }
  | { type: 'auctionNoBid' }
  | {
      type: 'auctionWithBid';
      bid: number;
      timeRemainingSeconds: number;
      expiryTime: Date;
    }
  | {
      type: 'auctionFinished';
      bid: number;
      timeRemainingSeconds: 0;
    };

export interface House {
  // houseid, unique within one page
  id: number;
  world: string;
  town: string;
  type: ResidenceType;
  name: string;
  size: number; // in sqm
  rent: number; // gold per billing period
  status: HouseStatus;
}

export type RowFailureKind = 'rowShapeMismatch' | 'fieldInvalid' | 'duplicateId';

export type HouseField = 'id' | 'name' | 'size' | 'rent' | 'status';

export interface RowFailure {
  row: number;
  kind: RowFailureKind;
  reason: string;
  field?: HouseField;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Raw cell text of one listing row, located by header label
 * (and the houseid input for `id`).
 */
export interface RawHouseRow {
  row: number;
  cells: Record<HouseField, string>;
}

export interface ExtractionResult {
  world: string;
  town: string;
  type: ResidenceType;
  houses: House[];
  failures: RowFailure[];
  rowCount: number;
  // container found, nothing emitted
  empty: boolean;
}

export interface ExtractionResultJson {
  world: string;
  town: string;
  type: ResidenceType;
  houses: HouseJson[];
  failures: RowFailure[];
  rowCount: number;
  empty: boolean;
}

export type HouseJson = Omit<House, 'status'> & { status: HouseStatusJson };

export type HouseStatusJson =
  | { type: 'rented' }
  | { type: 'auctionNoBid' }
  | { type: 'auctionWithBid'; bid: number; timeRemainingSeconds: number; expiryTime: string }
  | { type: 'auctionFinished'; bid: number; timeRemainingSeconds: 0 };
