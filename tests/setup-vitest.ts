// Fallback and skipped-reference logs are noise in test output; specs that assert on them set the level themselves.
if (!process.env.ALCHEMY_LOG_LEVEL) {
  process.env.ALCHEMY_LOG_LEVEL = "silent";
}
