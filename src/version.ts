export const DOCFACTS_VERSION = '0.1.0';
