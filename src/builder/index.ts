export * from './instruction-builder';
export * from './instruction-data-builder';
export * from './transaction-builder';
