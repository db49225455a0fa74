import type { Result } from "neverthrow";
import type {
  ContentsResponse,
  QueryParams,
  SearchError,
  SearchResponse,
  SimilarParams,
} from "../../../domain/models/search.ts";

/**
 * Output port for search repository
 * Defines the interface for search operations that the application needs from external systems
 */
export interface SearchRepository {
  search(params: QueryParams): Promise<Result<SearchResponse, SearchError>>;

  findSimilar(params: SimilarParams): Promise<Result<SearchResponse, SearchError>>;

  getContents(urls: ReadonlyArray<string>): Promise<Result<ContentsResponse, SearchError>>;

  getId(): string;

  getName(): string;
}
