import { isPageError, type ErrorJson } from '../errors';
import type {
  ExtractionResult,
  ExtractionResultJson,
  House,
  HouseJson,
  HouseStatus,
  HouseStatusJson,
} from '../types';
import type { AggregatedResidences } from './house-listing.service';

function toStatusJson(status: HouseStatus): HouseStatusJson {
  if (status.type === 'auctionWithBid') {
    return { ...status, expiryTime: status.expiryTime.toISOString() };
  }
  return status;
}

export function toHouseJson(house: House): HouseJson {
  return { ...house, status: toStatusJson(house.status) };
}

/**
 * JSON-serializable view of a result: primitives, enum strings, ISO dates.
 */
export function toResultJson(result: ExtractionResult): ExtractionResultJson {
  return {
    world: result.world,
    town: result.town,
    type: result.type,
    houses: result.houses.map(toHouseJson),
    failures: result.failures.map((failure) => ({ ...failure })),
    rowCount: result.rowCount,
    empty: result.empty,
  };
}

export function toResidencesJson(aggregated: AggregatedResidences): {
  world: string;
  residences: HouseJson[];
  failures: AggregatedResidences['failures'];
  empty: boolean;
} {
  return {
    world: aggregated.world,
    residences: aggregated.residences.map(toHouseJson),
    failures: aggregated.failures.map((failure) => ({ ...failure })),
    empty: aggregated.empty,
  };
}

export function toErrorJson(error: unknown): ErrorJson {
  if (isPageError(error)) {
    return error.toJSON();
  }
  return {
    code: 'INTERNAL_ERROR',
    message: 'Unexpected error while processing the upstream page',
  };
}
