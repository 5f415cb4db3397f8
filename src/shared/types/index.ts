/**
 * Campaign Ledger - Shared Types Export
 */

export * from './campaign.types';
export * from './notification.types';
