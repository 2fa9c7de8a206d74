/**
 * State persistence exports
 */

export { loadContext, parseContext, saveContext, serializeContext } from './store.js';
