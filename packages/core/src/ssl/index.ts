export * from './client-ssl.js';
