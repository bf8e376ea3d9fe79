export { SearchService, type SearchServiceOptions } from './SearchService.js'
export type {
  DetailsProvider,
  DetailsResult,
  SearchTitlesOptions,
  TitleSearchResult,
  TitlesLoadAction,
  TitlesLoadReport,
} from './SearchService.types.js'
