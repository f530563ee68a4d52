/**
 * Tests for audit logging
 * One line per auth event, at a level matching its outcome, with emails hashed
 */

import { describe, it, expect } from 'vitest';
import { AuthEventEmitter, getRecipientLogId, type AuthEvent } from '@latchkey/auth';
import { createLogger } from '@latchkey/observability';
import { initializeAuditLogging, writeAuditLine } from '../audit-logger.js';

function captureLogger() {
  const lines: Record<string, unknown>[] = [];
  const logger = createLogger(
    { level: 'info' },
    {
      write: (line: string) => {
        lines.push(JSON.parse(line));
      },
    }
  );
  return { logger, lines };
}

function event(overrides: Partial<AuthEvent> & Pick<AuthEvent, 'type'>): AuthEvent {
  return { timestamp: new Date('2026-03-01T12:00:00.000Z'), ...overrides };
}

describe('writeAuditLine', () => {
  it('logs successful events at info with the email replaced by a recipient id', () => {
    const { logger, lines } = captureLogger();

    writeAuditLine(
      event({ type: 'user.login.success', userId: 'user-1', email: 'member@example.com', ip: '203.0.113.9' }),
      logger
    );

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      msg: 'User login successful',
      event: 'user.login.success',
      userId: 'user-1',
      recipient: getRecipientLogId('member@example.com'),
      ip: '203.0.113.9',
      timestamp: '2026-03-01T12:00:00.000Z',
    });
    expect(JSON.stringify(lines[0])).not.toContain('member@example.com');
  });

  it('logs failures at warn', () => {
    const { logger, lines } = captureLogger();

    writeAuditLine(event({ type: 'user.login.failed', metadata: { reason: 'incorrect_credentials' } }), logger);
    writeAuditLine(
      event({ type: 'token.rejected', metadata: { purpose: 'confirm_email', reason: 'expired' } }),
      logger
    );

    expect(lines.map((line) => line.level)).toEqual([40, 40]);
    expect(lines[0]).toMatchObject({ userId: 'unknown', recipient: 'unknown', ip: 'unknown' });
    expect(lines[1]).toMatchObject({
      msg: 'Signed token rejected',
      metadata: { purpose: 'confirm_email', reason: 'expired' },
    });
  });

  it('logs mail delivery failures at error', () => {
    const { logger, lines } = captureLogger();

    writeAuditLine(
      event({ type: 'mail.delivery_failed', userId: 'user-1', metadata: { purpose: 'reset_password' } }),
      logger
    );

    expect(lines[0]).toMatchObject({ level: 50, msg: 'Auth email delivery failed' });
  });
});

describe('initializeAuditLogging', () => {
  it('writes a line for every event the emitter sends', async () => {
    const { logger, lines } = captureLogger();
    const emitter = new AuthEventEmitter();

    initializeAuditLogging(emitter, logger);
    emitter.emit({ type: 'session.created', userId: 'user-1', metadata: { activeSessionId: 'session-1' } });

    // Handlers run on a later microtask
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(lines.map((line) => line.msg)).toEqual([
      'Audit logging initialized for authentication events',
      'Active session created',
    ]);
  });
});
