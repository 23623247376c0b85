export { DeveloperAppListBuilder, EMPTY_LIST_TEXT } from './app-list-builder.js';
export { HtmlIdGenerator, cleanHtmlId } from './html-id.js';
export type { DeveloperAppListBuilderOptions } from './app-list-builder.js';
export type {
  AppListing,
  AppNameCell,
  AppRow,
  Link,
  Operation,
  Redirect,
  RouteMatch,
} from './types.js';
