export * from './alphabets';
export * from './bank-account';
export * from './ccc';
export * from './cif';
export * from './contact';
export * from './identifier';
export * from './identity-number';
export * from './nif';
export * from './taxid';
export * from './validation-result';
