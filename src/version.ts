export const QUERYGATE_VERSION = '1.0.0';
