export { createApp, startServer } from './server.js';
