/**
 * Expected error that shouldn't print a stack trace
 */
export class YargsError extends Error {}
