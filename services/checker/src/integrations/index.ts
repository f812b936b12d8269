/**
 * Integrations Index
 *
 * External process integrations for the checker.
 */

export * from './script-invoker';
