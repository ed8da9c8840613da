// Test-process keepalive: AbortSignal.timeout() timers are unref'd, so a test that
// only waits on such a signal would otherwise see the event loop drain first.
// The runner is started with --test-force-exit, which ends the process once all tests finish.
setInterval(() => {}, 1 << 30);
