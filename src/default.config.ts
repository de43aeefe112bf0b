export default {
  testDir: './test',
  filePattern: '\\.stampede\\.(json|ya?ml|m?js)$',
  concurrency: 1,
  bail: false,
  timeout: 30000,
  retries: 0,
  backoff: 200,
  backoffMultiplier: 2,
  retryOn: [],
  tags: [],
  randomize: false,
  verbose: false,
  cancelMode: 'graceful',
  headers: {},
  pattern: 'constant',
  users: 10,
  duration: 30000,
  reportInterval: 1000,
};
