import { describe, it, expect, vi } from 'vitest';
import type { AssumeRoleCommandInput, AssumeRoleCommandOutput } from '@aws-sdk/client-sts';
import { createValidatedConfig, type RoleArn, type RoleSessionName } from '../../src/config/app-config.js';
import { StsCredentialIssuer, toAssumeRoleInput, type AssumeRoleSend } from '../../src/infra/sts-credential-issuer/index.js';
import { FakeLogger } from '../helpers/FakeLogger.js';

const ROLE_ARN = 'arn:aws:iam::111122223333:role/deployer' as RoleArn;
const SESSION = 'session-1' as RoleSessionName;

const baseConfig = createValidatedConfig({ roleArn: ROLE_ARN, roleSessionName: SESSION, durationSeconds: 900 });

function output(credentials: AssumeRoleCommandOutput['Credentials']): AssumeRoleCommandOutput {
  return { $metadata: {}, Credentials: credentials };
}

const ISSUED = output({
  AccessKeyId: 'ASIAISSUED',
  SecretAccessKey: 'test-secret',
  SessionToken: 'test-token',
  Expiration: new Date('2030-01-01T00:15:00Z'),
});

describe('toAssumeRoleInput', () => {
  it('sends only role ARN, session name and duration by default', () => {
    expect(toAssumeRoleInput(baseConfig)).toEqual({
      RoleArn: ROLE_ARN,
      RoleSessionName: SESSION,
      DurationSeconds: 900,
    });
  });

  it('leaves out every optional member the config does not carry', () => {
    const input = toAssumeRoleInput(createValidatedConfig({ roleArn: ROLE_ARN, roleSessionName: SESSION }));

    expect(Object.keys(input).sort()).toEqual(['RoleArn', 'RoleSessionName']);
    expect(input).not.toHaveProperty('DurationSeconds');
    expect(input).not.toHaveProperty('ExternalId');
    expect(input).not.toHaveProperty('SerialNumber');
    expect(input).not.toHaveProperty('TokenCode');
    expect(input).not.toHaveProperty('SourceIdentity');
  });

  it('maps every optional parameter to its request member', () => {
    const input = toAssumeRoleInput(
      createValidatedConfig({
        roleArn: ROLE_ARN,
        roleSessionName: SESSION,
        durationSeconds: 3600,
        externalId: 'ext-123',
        serialNumber: 'arn:aws:iam::111122223333:mfa/dev',
        tokenCode: '123456',
        sourceIdentity: 'dev@example.com',
      })
    );

    expect(input).toEqual({
      RoleArn: ROLE_ARN,
      RoleSessionName: SESSION,
      DurationSeconds: 3600,
      ExternalId: 'ext-123',
      SerialNumber: 'arn:aws:iam::111122223333:mfa/dev',
      TokenCode: '123456',
      SourceIdentity: 'dev@example.com',
    });
  });
});

describe('StsCredentialIssuer', () => {
  it('returns the issued credentials', async () => {
    const send = vi.fn<AssumeRoleSend>().mockResolvedValue(ISSUED);
    const issuer = new StsCredentialIssuer(send, new FakeLogger().asLogger());

    const result = await issuer.assumeRole(baseConfig, new AbortController().signal);

    expect(result._unsafeUnwrap()).toEqual({
      accessKeyId: 'ASIAISSUED',
      secretAccessKey: 'test-secret',
      sessionToken: 'test-token',
      expiration: new Date('2030-01-01T00:15:00Z'),
    });
  });

  it('passes the request and the cancellation signal to STS', async () => {
    const send = vi.fn<AssumeRoleSend>().mockResolvedValue(ISSUED);
    const issuer = new StsCredentialIssuer(send, new FakeLogger().asLogger());
    const controller = new AbortController();

    await issuer.assumeRole(baseConfig, controller.signal);

    expect(send).toHaveBeenCalledTimes(1);
    const [input, signal] = send.mock.calls[0] ?? [];
    expect(input).toEqual<AssumeRoleCommandInput>({ RoleArn: ROLE_ARN, RoleSessionName: SESSION, DurationSeconds: 900 });
    expect(signal).toBe(controller.signal);
  });

  it('maps a rejected request to a rejected failure', async () => {
    const send = vi.fn<AssumeRoleSend>().mockRejectedValue(new Error('AccessDenied: not authorized'));
    const issuer = new StsCredentialIssuer(send, new FakeLogger().asLogger());

    const error = (await issuer.assumeRole(baseConfig, new AbortController().signal))._unsafeUnwrapErr();

    expect(error._tag).toBe('CredentialRequestFailed');
    expect(error.reason).toBe('rejected');
    expect(error.message).toBe(`Failed to assume role ${ROLE_ARN}: AccessDenied: not authorized`);
  });

  it('does not call STS when already cancelled', async () => {
    const send = vi.fn<AssumeRoleSend>().mockResolvedValue(ISSUED);
    const issuer = new StsCredentialIssuer(send, new FakeLogger().asLogger());
    const controller = new AbortController();
    controller.abort();

    const error = (await issuer.assumeRole(baseConfig, controller.signal))._unsafeUnwrapErr();

    expect(send).not.toHaveBeenCalled();
    expect(error.reason).toBe('cancelled');
  });

  it('reports cancellation when the signal aborts mid-request', async () => {
    const controller = new AbortController();
    const send = vi.fn<AssumeRoleSend>().mockImplementation(
      (_input, signal) =>
        new Promise((_resolve, reject) => {
          signal.addEventListener('abort', () => reject(new Error('Request aborted')));
        })
    );
    const issuer = new StsCredentialIssuer(send, new FakeLogger().asLogger());

    const pending = issuer.assumeRole(baseConfig, controller.signal);
    controller.abort();
    const error = (await pending)._unsafeUnwrapErr();

    expect(error.reason).toBe('cancelled');
    expect(error.message).toBe(`Credential request for ${ROLE_ARN} was cancelled`);
  });

  it.each([
    ['no credentials', undefined],
    ['no session token', { AccessKeyId: 'ASIA', SecretAccessKey: 'test-secret', SessionToken: undefined, Expiration: undefined }],
  ])('fails on a response with %s', async (_label, credentials) => {
    const send = vi.fn<AssumeRoleSend>().mockResolvedValue(output(credentials));
    const issuer = new StsCredentialIssuer(send, new FakeLogger().asLogger());

    const error = (await issuer.assumeRole(baseConfig, new AbortController().signal))._unsafeUnwrapErr();

    expect(error.reason).toBe('incomplete_response');
    expect(error.message).toBe(`No credentials returned for ${ROLE_ARN}`);
  });

  it('logs the request without credential material', async () => {
    const send = vi.fn<AssumeRoleSend>().mockResolvedValue(ISSUED);
    const logger = new FakeLogger();
    const issuer = new StsCredentialIssuer(send, logger.asLogger());

    await issuer.assumeRole(baseConfig, new AbortController().signal);

    expect(logger.getEntries('debug').map((e) => e.msg)).toEqual(['requesting credentials', 'credentials issued']);
    expect(JSON.stringify(logger.entries)).not.toContain('test-secret');
    expect(JSON.stringify(logger.entries)).not.toContain('test-token');
  });
});
