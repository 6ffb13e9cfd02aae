export const AI_PROVIDER_TOKEN = Symbol('AI_PROVIDER');
export const REVIEW_STORAGE_TOKEN = Symbol('REVIEW_STORAGE');
export const REPORT_GENERATOR_TOKEN = Symbol('REPORT_GENERATOR');
export const SOURCE_HOSTING_TOKEN = Symbol('SOURCE_HOSTING');
export const REVIEW_SERVICE_SETTINGS_TOKEN = Symbol('REVIEW_SERVICE_SETTINGS');
