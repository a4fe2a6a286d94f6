export const NAME = 'gatehouse';
export const VERSION = '0.4.0';
