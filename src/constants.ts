export const DEFAULT_PAGE_SIZE = 1000;

export const DEFAULT_GRAPH_URI = 'bolt://localhost:7687';

export const DEFAULT_OPENSEARCH_NODE = 'http://localhost:9200';

export const DEFAULT_PG_SCHEMA = 'graph_index_sync';

export const ENV_PREFIX = 'GRAPH_SYNC_';

export const PAGINATION_SKIP_PARAM = 'skip';

export const PAGINATION_LIMIT_PARAM = 'limit';

export const INITIAL_QUERY_NAME = 'initial';
