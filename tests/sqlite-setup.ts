// Jest test setup file, loaded before each test suite
//
// better-sqlite3's native addon is loaded once per process and keeps the
// SqliteError class it was first given. Jest gives every suite a fresh module
// registry, so later suites in the same worker would see errors built from an
// earlier suite's class. Point the addon at this suite's class.

import Database from 'better-sqlite3';

const addon: { setErrorConstructor(ctor: unknown): void } = require('better-sqlite3/build/Release/better_sqlite3.node');
addon.setErrorConstructor(Database.SqliteError);
