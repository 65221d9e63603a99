export * from './verification-agent.js';
