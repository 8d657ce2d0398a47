export * from './validate-batch.dto';
export * from './validate-identity-number.dto';
export * from './validate-value.dto';
