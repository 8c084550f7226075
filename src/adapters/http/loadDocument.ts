import type { DataKind } from '../../core/data/DateCache.js';
import type { HealthDataAccess } from '../../core/data/HealthDataService.js';
import { nonEmptyDocument, type FitnessDocument } from '../../ports/FitnessServicePort.js';
import { DataUnavailableError, NoDataAvailableError, errorMessage } from '../../utils/errors.js';

const KIND_LABELS: Record<DataKind, string> = {
  stats: 'activity',
  sleep: 'sleep',
};

/**
 * Fetches the document an insight route depends on and translates data-layer
 * failures into service-unavailable errors.
 */
export async function loadDocument(
  data: HealthDataAccess,
  kind: DataKind,
  date?: string
): Promise<FitnessDocument> {
  const label = KIND_LABELS[kind];

  let document: FitnessDocument | null;
  try {
    document = kind === 'stats' ? await data.getStats(date) : await data.getSleep(date);
  } catch (error) {
    throw new DataUnavailableError(`Unable to fetch Garmin ${label} data: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const present = nonEmptyDocument(document);
  if (!present) {
    throw new NoDataAvailableError(`No ${label} data available from Garmin API`);
  }
  return present;
}
