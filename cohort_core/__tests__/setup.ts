// Restore console spies and fake timers after each test
afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
});
