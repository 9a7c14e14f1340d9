/**
 * Registry module exports
 */

export { SnapshotRegistry, type SnapshotProvider } from './registry';
