export * from './pem';
export * from './parameter-artifact';
export * from './certificate-manager';
