export { StaticServer, type StaticServerOptions } from './server/static-server.js';
