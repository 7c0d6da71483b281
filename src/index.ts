export * from './address';
export * from './checkpoint-hash';
export * from './errors';
export * from './instruction';
export * from './keypair';
export * from './message';
export * from './signer';
export * from './system-program';
export * from './transaction';
