// Pin tunables so a developer's shell cannot change test expectations
for (const key of Object.keys(process.env)) {
  if (key.startsWith('CONTENT_')) {
    delete process.env[key];
  }
}
