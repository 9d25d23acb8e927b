export { default as webhookRoutes } from './webhook-routes.js';
export type { WebhookRoutesOptions } from './webhook-routes.js';
export { default as statsRoutes } from './stats-routes.js';
export type { StatsRoutesOptions } from './stats-routes.js';
export { default as queryRoutes } from './query-routes.js';
export type { QueryRoutesOptions } from './query-routes.js';
export { default as ruleRoutes } from './rule-routes.js';
export type { RuleRoutesOptions } from './rule-routes.js';
export { default as healthRoutes } from './health-routes.js';
export type { HealthRoutesOptions, HealthBody, DependencyStatus } from './health-routes.js';
export { registerErrorHandler } from './error-handler.js';
export type { ErrorBody } from './error-handler.js';
export { SECRET_HEADER, requireSecret, secretFrom } from './auth.js';
