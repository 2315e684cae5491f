// Run before each test file

// Keep service logging out of the test output; tests that care about a
// message assert on the spy
jest.spyOn(console, 'log').mockImplementation(() => undefined);
jest.spyOn(console, 'warn').mockImplementation(() => undefined);
jest.spyOn(console, 'error').mockImplementation(() => undefined);
