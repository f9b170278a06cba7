// File: src/config/constants.ts
// Configuration constants for the application

/**
 * Application name and version information
 */
export const APP_NAME = 'aws-region-report'
export const APP_DESCRIPTION = 'CLI tool to report AWS region and service availability from SSM Parameter Store'
export const APP_VERSION = '0.1.0'

/**
 * Region used for Parameter Store and STS calls when none is configured.
 * The global-infrastructure namespace is readable from any commercial region.
 */
export const DEFAULT_REGION = 'us-east-1'

/**
 * Public Parameter Store namespace holding region and service metadata
 */
export const GLOBAL_INFRASTRUCTURE_PATH = '/aws/service/global-infrastructure'

// Collection tuning
export const DEFAULT_MAX_WORKERS = 10
export const DEFAULT_MAX_RETRIES = 3
export const DEFAULT_CALL_TIMEOUT_SECONDS = 30

// Cache
export const DEFAULT_CACHE_HOURS = 24
export const MAX_CACHE_HOURS = 8760
export const CACHE_DIRECTORY = 'cache'
export const CACHE_FILE_NAME = 'aws_data_cache.json'

// Output
export const DEFAULT_OUTPUT_DIR = 'reports'
export const DEFAULT_FORMATS = ['csv']
export const DEFAULT_REGIONS_FILE = 'regions_services.csv'
export const DEFAULT_MATRIX_FILE = 'services_regions_matrix.csv'

/**
 * Official announcement feed listing region launches
 */
export const DEFAULT_FEED_URL = 'https://docs.aws.amazon.com/global-infrastructure/latest/regions/regions.rss'
