export const LEXLOCATOR_VERSION = '0.1.0';
