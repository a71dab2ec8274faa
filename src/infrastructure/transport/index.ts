export { createFetchTransport } from './fetch-transport.js';
