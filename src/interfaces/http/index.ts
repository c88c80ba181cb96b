export { default as webhookRoutes } from './webhook-routes.js';
export { default as evidenceRoutes } from './evidence-routes.js';
export { default as revisionRoutes } from './revision-routes.js';
