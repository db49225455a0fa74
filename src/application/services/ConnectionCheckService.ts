import type { Result } from "neverthrow";
import type {
  ContentsResponse,
  SearchError,
  SearchResponse,
} from "../../domain/models/search.ts";
import type { SearchRepository } from "../ports/out/SearchRepository.ts";
import { debug } from "../../config/logger.ts";

export const CHECK_URL = "https://example.com";
export const DATE_FILTER_START = "2024-01-01";

export interface CheckOutcome {
  readonly name: string;
  readonly critical: boolean;
  readonly passed: boolean;
  readonly detail: string;
}

export interface ConnectionReport {
  readonly outcomes: ReadonlyArray<CheckOutcome>;
  readonly passed: number;
  readonly criticalPassed: number;
  readonly criticalTotal: number;
  readonly success: boolean;
}

interface Check {
  readonly name: string;
  readonly critical: boolean;
  run(): Promise<Omit<CheckOutcome, "name" | "critical">>;
}

/**
 * Exercises every provider endpoint once against the live API.
 * Only critical checks decide the overall outcome.
 */
export class ConnectionCheckService {
  constructor(private readonly searchRepository: SearchRepository) {}

  async run(): Promise<ConnectionReport> {
    const outcomes: CheckOutcome[] = [];

    for (const check of this.checks()) {
      debug(`[CONNECTION_CHECK] Running ${check.name}`);
      const outcome = await check.run();
      outcomes.push({ name: check.name, critical: check.critical, ...outcome });
    }

    const critical = outcomes.filter((outcome) => outcome.critical);
    const criticalPassed = critical.filter((outcome) => outcome.passed).length;

    return {
      outcomes,
      passed: outcomes.filter((outcome) => outcome.passed).length,
      criticalPassed,
      criticalTotal: critical.length,
      success: criticalPassed === critical.length,
    };
  }

  private checks(): Check[] {
    const repository = this.searchRepository;

    return [
      {
        name: "Exa API connection",
        critical: true,
        run: async () =>
          describeSearch(
            await repository.search({ q: "test query", maxResults: 1 }),
            "Exa API returned no results",
          ),
      },
      {
        name: "Content extraction",
        critical: false,
        run: async () => describeContents(await repository.getContents([CHECK_URL])),
      },
      {
        name: "Similarity search",
        critical: false,
        run: async () =>
          describeSearch(
            await repository.findSimilar({ url: CHECK_URL, maxResults: 1 }),
            "Similarity search returned no results",
          ),
      },
      {
        name: "Date-filtered search",
        critical: false,
        run: async () =>
          describeSearch(
            await repository.search({
              q: "technology news",
              maxResults: 1,
              filters: { startPublishedDate: DATE_FILTER_START },
            }),
            "Date-filtered search returned no results",
          ),
      },
      {
        name: "Neural search",
        critical: false,
        run: async () =>
          describeSearch(
            await repository.search({ q: "artificial intelligence", maxResults: 1, type: "neural" }),
            "Neural search returned no results",
          ),
      },
    ];
  }
}

function describeSearch(
  result: Result<SearchResponse, SearchError>,
  emptyMessage: string,
): Omit<CheckOutcome, "name" | "critical"> {
  return result.match(
    (response) => {
      const first = response.results[0];
      if (!first) {
        return { passed: false, detail: emptyMessage };
      }
      const score = first.relevanceScore === undefined ? "N/A" : first.relevanceScore.toFixed(3);
      return {
        passed: true,
        detail: `${first.title || "No title"} (${first.url}, score ${score})`,
      };
    },
    (error) => ({ passed: false, detail: `${error.type}: ${error.message}` }),
  );
}

function describeContents(
  result: Result<ContentsResponse, SearchError>,
): Omit<CheckOutcome, "name" | "critical"> {
  return result.match(
    (response) => {
      const first = response.contents[0];
      if (!first) {
        return { passed: false, detail: "Content extraction returned no results" };
      }
      const length = first.text?.length ?? 0;
      return {
        passed: true,
        detail: `${first.title ?? "No title"} (${first.url}, ${length} characters)`,
      };
    },
    (error) => ({ passed: false, detail: `${error.type}: ${error.message}` }),
  );
}
