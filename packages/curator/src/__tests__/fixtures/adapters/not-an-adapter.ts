export const adapter = { name: 'missing-fetch' };
