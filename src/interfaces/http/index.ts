export { default as webhookRoutes } from './webhook-routes.js';
export { default as messageRoutes } from './message-routes.js';
export { default as sessionRoutes } from './session-routes.js';
export { default as healthRoutes } from './health-routes.js';
