import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  DEFAULT_PROVIDER_SETTINGS,
  ProviderSettingsSchema,
  canTransition,
  idleStatus,
  isCallsign,
  isRelationshipStatus,
  normalizeCallsign,
  progressPercent,
} from '../src/models.js';

describe('models', () => {
  it('should allow only forward status transitions', () => {
    assert.strictEqual(canTransition('pending', 'active'), true);
    assert.strictEqual(canTransition('pending', 'declined'), true);
    assert.strictEqual(canTransition('pending', 'terminated'), true);
    assert.strictEqual(canTransition('active', 'terminated'), true);

    assert.strictEqual(canTransition('active', 'pending'), false);
    assert.strictEqual(canTransition('active', 'declined'), false);
    assert.strictEqual(canTransition('declined', 'active'), false);
    assert.strictEqual(canTransition('terminated', 'active'), false);
    assert.strictEqual(canTransition('terminated', 'pending'), false);
  });

  it('should recognise relationship statuses', () => {
    assert.strictEqual(isRelationshipStatus('active'), true);
    assert.strictEqual(isRelationshipStatus('ACTIVE'), false);
    assert.strictEqual(isRelationshipStatus(1), false);
  });

  it('should normalise callsigns to upper case', () => {
    assert.strictEqual(normalizeCallsign(' alfa1 '), 'ALFA1');
  });

  it('should accept only path-safe callsigns', () => {
    assert.strictEqual(isCallsign('base_1-a'), true);
    assert.strictEqual(isCallsign('../etc'), false);
    assert.strictEqual(isCallsign(''), false);
  });

  it('should fill settings fields missing from a stored file', () => {
    assert.deepStrictEqual(ProviderSettingsSchema.parse({ enabled: true }), { ...DEFAULT_PROVIDER_SETTINGS, enabled: true });
    assert.strictEqual(ProviderSettingsSchema.safeParse({ defaultMaxSnapshots: -1 }).success, false);
  });

  it('should floor progress and report 100 for empty runs', () => {
    assert.strictEqual(progressPercent(1, 3), 33);
    assert.strictEqual(progressPercent(2, 3), 66);
    assert.strictEqual(progressPercent(3, 3), 100);
    assert.strictEqual(progressPercent(0, 0), 100);
  });

  it('should start idle with no error', () => {
    const status = idleStatus();
    assert.strictEqual(status.status, 'idle');
    assert.strictEqual(status.progressPercent, 0);
    assert.strictEqual(status.errorCode, null);
  });

  it('should default to provider mode off', () => {
    assert.deepStrictEqual(DEFAULT_PROVIDER_SETTINGS, {
      enabled: false,
      maxTotalStorageBytes: 10737418240,
      defaultMaxClientStorageBytes: 1073741824,
      defaultMaxSnapshots: 10,
      autoAcceptFromContacts: false,
    });
  });
});
