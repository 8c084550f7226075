/** A JSON document returned by the fitness service, kept opaque by the data layer. */
export type FitnessDocument = Record<string, unknown>;

export interface FitnessCredentials {
  email: string;
  password: string;
}

export interface FitnessServicePort<TSession> {
  authenticate(credentials: FitnessCredentials): Promise<TSession>;
  persistSession(session: TSession, location: string): Promise<void>;
  fetchDailySummary(session: TSession, date: string): Promise<FitnessDocument | null>;
  fetchSleepData(session: TSession, date: string): Promise<FitnessDocument | null>;
}

/** Returns the document when it carries at least one field, otherwise null. */
export function nonEmptyDocument(document: FitnessDocument | null): FitnessDocument | null {
  if (!document || Object.keys(document).length === 0) return null;
  return document;
}
