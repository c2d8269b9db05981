export * from './shell-agent.js';
