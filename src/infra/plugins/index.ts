export { registerCors, parseAllowedOrigins } from './cors.js';
