export * from './plist-error';
export * from './conversion-error';
export * from './bounds-error';
export * from './decode-error';
export * from './encode-error';
export * from './io-error';
export * from './construction-error';
