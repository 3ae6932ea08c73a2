export const NAME = 'dispatch-bench';
export const VERSION = '0.1.0';
