import type { Result } from "neverthrow";
import type { ContentsResponse, SearchError, SearchResponse } from "../../../domain/models/search.ts";
import type {
  ContentsRequest,
  ExampleSearchRequest,
  FindSimilarRequest,
  RecentSearchRequest,
  SearchRequest,
} from "../../../domain/models/mcp.ts";

/**
 * Input port for search functionality
 * Defines the operations exposed to controllers or other input adapters
 */
export interface SearchUseCase {
  search(request: SearchRequest): Promise<Result<SearchResponse, SearchError>>;

  getContents(request: ContentsRequest): Promise<Result<ContentsResponse, SearchError>>;

  findSimilar(request: FindSimilarRequest): Promise<Result<SearchResponse, SearchError>>;

  searchRecent(request: RecentSearchRequest): Promise<Result<SearchResponse, SearchError>>;

  searchByExample(request: ExampleSearchRequest): Promise<Result<SearchResponse, SearchError>>;
}
