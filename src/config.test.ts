import { describe, it, expect } from 'vitest';
import { ConfigError } from './errors';
import { loadCredentials } from './config';

describe('loadCredentials', () => {
    it('reads both credentials from the environment', () => {
        expect(loadCredentials({ MATHPIX_APP_ID: 'test-id', MATHPIX_APP_KEY: 'test-secret' })).toEqual({
            appId: 'test-id',
            appKey: 'test-secret',
        });
    });

    it('refuses to run without a key', () => {
        expect(() => loadCredentials({ MATHPIX_APP_ID: 'test-id' })).toThrow(ConfigError);
    });
});
