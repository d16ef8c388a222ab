import fs from 'fs/promises';
import type { Track } from '../matching/types.js';
import { logger } from '../utils/logger.js';

export interface Show {
  date: string;
  venue: string;
  city: string;
  setlist: string[];
}

/** Tour payload as served by the setlist endpoint */
export interface TourData {
  status?: string;
  data: {
    shows: Show[];
  };
}

export interface TourDataSource {
  /** Remote endpoint; null skips straight to the local file */
  url: string | null;
  localPath: string;
  timeoutMs: number;
}

export class TourDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TourDataError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Fetch tour setlists from the endpoint, falling back to the local JSON
 * file when the endpoint is unset or fails. The result is validated.
 */
export async function fetchTourData(source: TourDataSource): Promise<TourData> {
  let data: unknown;
  let fetched = false;

  if (source.url) {
    try {
      logger.info(`Fetching tour data from API: ${source.url}`);
      const response = await fetch(source.url, { signal: AbortSignal.timeout(source.timeoutMs) });
      if (!response.ok) {
        throw new Error(`API error: ${response.status} ${response.statusText}`);
      }
      data = await response.json();
      fetched = true;
      logger.info(`API response status: ${isRecord(data) && typeof data.status === 'string' ? data.status : 'unknown'}`);
    } catch (error) {
      logger.warn(
        `API request failed: ${error instanceof Error ? error.message : String(error)}; falling back to local file`
      );
    }
  }

  if (!fetched) {
    data = await readLocalTourData(source.localPath);
  }

  return validateTourData(data);
}

async function readLocalTourData(localPath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(localPath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new TourDataError(`Tour data unavailable: API failed and local file not found at ${localPath}`);
    }
    throw error;
  }

  logger.info(`Loading tour data from local file: ${localPath}`);
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new TourDataError(
      `Tour data file ${localPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Ensure the tour JSON has the expected nested structure
 * @throws TourDataError naming the first problem found
 */
export function validateTourData(data: unknown): TourData {
  if (!isRecord(data)) {
    throw new TourDataError('Tour data must be a JSON object');
  }
  if (!isRecord(data.data)) {
    throw new TourDataError("Tour data missing top-level 'data' key");
  }
  const shows = data.data.shows;
  if (shows === undefined) {
    throw new TourDataError("Tour data missing 'data.shows' key");
  }
  if (!Array.isArray(shows) || shows.length === 0) {
    throw new TourDataError("'data.shows' must be a non-empty list");
  }

  const validShows: Show[] = shows.map((show: unknown, index) => {
    if (!isRecord(show)) {
      throw new TourDataError(`Show ${index} must be an object`);
    }
    for (const key of ['date', 'venue', 'city', 'setlist']) {
      if (!(key in show)) {
        throw new TourDataError(`Show ${index} missing required key '${key}'`);
      }
    }
    const { setlist } = show;
    if (!Array.isArray(setlist)) {
      throw new TourDataError(`Show ${index} 'setlist' must be a list`);
    }
    return {
      date: String(show.date),
      venue: String(show.venue),
      city: String(show.city),
      setlist: setlist.map((name: unknown) => String(name))
    };
  });

  return {
    status: typeof data.status === 'string' ? data.status : undefined,
    data: { shows: validShows }
  };
}

/**
 * Convert nested shows into one Track per performed song, in show then setlist order
 */
export function flattenSetlists(tourData: TourData): Track[] {
  const tracks: Track[] = [];

  for (const show of tourData.data.shows) {
    for (const trackName of show.setlist) {
      tracks.push({
        showDate: show.date,
        venueName: show.venue,
        city: show.city,
        setlistTrackName: trackName
      });
    }
  }

  logger.info(`Flattened ${tracks.length} track entries across ${tourData.data.shows.length} shows`);
  return tracks;
}
