export * from './extraction-agent.js';
