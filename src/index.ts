export * from './core';
export * from './types';
export { loadResources } from './resources';
export { loadConfig, getDefaultConfig, validateConfig } from './config';
export { createApp, startServer } from './api/server';
export { VERSION } from './version';
