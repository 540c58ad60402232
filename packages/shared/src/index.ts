// @plugforge/shared - Data contracts shared by the plugin host and its clients

export * from './schemas/index.js';
