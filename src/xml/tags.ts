export const xmlDeclaration = '<?xml version="1.0" encoding="UTF-8"?>';
export const plistDoctype = '<!DOCTYPE plist PUBLIC "-//Apple//DTD PLIST 1.0//EN" "http://www.apple.com/DTDs/PropertyList-1.0.dtd">';
export const plistVersion = '1.0';

/** the lone key of the dictionary that stands in for a UID */
export const uidKey = 'CF$UID';
