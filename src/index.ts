/**
 * Public entry point.
 *
 *   const dispatcher = new Dispatcher({ topics: 'my-secret-topic' });
 *   await dispatcher.notify('Training finished', { tags: ['tada'] });
 */
export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/index.js';
