/**
 * Runs before every test file, ahead of any module import.
 */

// Keeps the logger quiet and off the filesystem
process.env.NODE_ENV = "test";

// A developer's .env must not leak into settings tests
delete process.env.TELEGRAM_BOT_TOKEN;
delete process.env.OWNER_TELEGRAM_ID;

export {};
