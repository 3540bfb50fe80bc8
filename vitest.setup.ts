/**
 * Centralized Vitest setup for lexlocator
 *
 * Logs stay quiet unless LEXLOCATOR_LOG_LEVEL is set explicitly, and provider
 * credentials from the developer's shell never reach the code under test.
 */

if (!process.env.LEXLOCATOR_LOG_LEVEL) {
  process.env.LEXLOCATOR_LOG_LEVEL = 'silent';
}

delete process.env.OPENAI_API_KEY;
delete process.env.AWS_ACCESS_KEY_ID;
delete process.env.AWS_SECRET_ACCESS_KEY;
delete process.env.AWS_SESSION_TOKEN;
