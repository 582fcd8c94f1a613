/**
 * Mock script that prints text instead of JSON.
 */
console.log('all good!');

export {};
