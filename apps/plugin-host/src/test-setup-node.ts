/**
 * Test setup for backend (node environment) tests.
 */
import 'reflect-metadata';
import { Logger } from '@nestjs/common';

process.env.NODE_ENV = 'test';

// Silence NestJS Logger output during tests to keep logs readable.
Logger.overrideLogger(false);
