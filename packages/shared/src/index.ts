export * from './constants';
export * from './schemas/ledger-schemas';
export type * from './types/participant';
export type * from './types/expense';
export type * from './types/relationship';
export type * from './types/balance';
export type * from './types/currency';
