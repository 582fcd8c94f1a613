/**
 * Mock script whose stdout does not match the output contract.
 */
console.log(JSON.stringify({ epics: [{ key: 42 }] }));

export {};
