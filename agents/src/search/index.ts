/**
 * Search - web search and page content enhancement
 */

export * from './web-search-client.js';
export * from './page-content.js';
