export const NAME = 'ddd-scaffold';
export const VERSION = '0.1.0';
