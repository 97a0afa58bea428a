export * from './address';
export * from './blockhash';
export * from './builder';
export * from './compute-budget';
export * from './errors';
export * from './instruction';
export * from './keypair';
export * from './lookup-table';
export * from './message';
export * from './program-address';
export * from './programs';
export * from './signature';
export * from './transaction';
export * from './util/inspect-transaction';
export * as shortvec from './utils/shortvec-encoding';
