export const NAME = 'tasksync';
export const VERSION = '0.1.0';
