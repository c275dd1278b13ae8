import { describe, expect, it } from 'vitest';

import { redactConfiguration, toAwsClientConfig } from './clientConfig';

const config = Object.freeze({
  accessKeyId: 'TESTKEYID00001234',
  secretAccessKey: 'test-secret',
  region: 'us-east-2',
});

describe('clientConfig', () => {
  it('maps resolved configuration onto an AWS client config', () => {
    expect(toAwsClientConfig(config)).toEqual({
      region: 'us-east-2',
      credentials: {
        accessKeyId: 'TESTKEYID00001234',
        secretAccessKey: 'test-secret',
      },
    });
  });

  it('redacts credentials', () => {
    expect(redactConfiguration(config)).toEqual({
      accessKeyId: '****1234',
      secretAccessKey: '****',
      region: 'us-east-2',
    });
    expect(redactConfiguration({ ...config, accessKeyId: 'ABCD' })).toEqual({
      accessKeyId: '****',
      secretAccessKey: '****',
      region: 'us-east-2',
    });
  });
});
