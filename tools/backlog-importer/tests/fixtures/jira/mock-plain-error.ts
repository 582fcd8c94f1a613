/**
 * Mock script that fails with plain-text stderr.
 */
process.stderr.write('something went wrong\n');
process.exit(3);

export {};
