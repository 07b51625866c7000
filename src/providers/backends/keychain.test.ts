import { describe, it, expect } from 'vitest';
import { keychainClassifier, parseKeychainReference } from './keychain';
import { classifyError } from '../classify';
import { AuthError, NotFoundError } from '../errors';

describe('parseKeychainReference', () => {
  it('splits service and account at the first slash', () => {
    expect(parseKeychainReference(' github / octo ')).toEqual({ name: 'github/octo', service: 'github', account: 'octo' });
    expect(parseKeychainReference('api/team/bot').account).toBe('team/bot');
  });

  it('requires both parts', () => {
    expect(() => parseKeychainReference('github')).toThrow('expected service/account');
    expect(() => parseKeychainReference('github/ ')).toThrow('expected service/account');
  });
});

describe('keychainClassifier', () => {
  const ctx = { provider: 'keychain', key: 'github/octo', operation: 'get' };

  it('maps platform messages', () => {
    expect(
      classifyError(new Error('The specified item could not be found in the keychain.'), keychainClassifier, ctx)
    ).toBeInstanceOf(NotFoundError);
    expect(classifyError(new Error('User interaction is not allowed.'), keychainClassifier, ctx)).toBeInstanceOf(
      AuthError
    );
  });
});
