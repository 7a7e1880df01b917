export const bplistMagicNumber = 'bplist';
export const versionByteLength = 2;
export const supportedBplistVersion = '00';

export const headerByteLength = bplistMagicNumber.length + versionByteLength;
