/**
 * Services module exports
 */
export { IPResolver, isValidIPv4, extractIP, type IPResolverOptions } from './IPResolver.js';
export { DNSManager } from './DNSManager.js';
export { Notifier, buildCardMessage, signFeishu, type NotifierOptions, type FeishuCardMessage } from './Notifier.js';
export { StateStore } from './StateStore.js';
