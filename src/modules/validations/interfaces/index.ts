export * from './validation-response.interface';
