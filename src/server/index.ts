export { createRoutes } from './routes.js';
export { RouterServer, startRouterServer, type RouterServerConfig } from './server.js';
