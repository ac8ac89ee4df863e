import {describe, expect, it} from 'vitest';

import {createProtobufAuthorizationCodec, evaluateAuthorizationReply, toUserHeaderValue} from '../index';
import {encodeReply} from './helpers';

const codec = createProtobufAuthorizationCodec();

describe('toUserHeaderValue', () => {
  it('keeps non-blank users', () => {
    expect(toUserHeaderValue('alice')).toBe('alice');
  });

  it('turns blank users into a single space', () => {
    expect(toUserHeaderValue('')).toBe(' ');
    expect(toUserHeaderValue('   ')).toBe(' ');
  });
});

describe('evaluateAuthorizationReply', () => {
  it('allows with the user header value and retained message', () => {
    expect(
      evaluateAuthorizationReply({
        status_code: 0,
        response_body: encodeReply({allow: true, user: 'alice', message: 'ok', headers: {'x-uip-groups': 'ops'}}),
        codec
      })
    ).toEqual({
      kind: 'allow',
      user_header_value: 'alice',
      message: 'ok',
      reply_headers: {'x-uip-groups': 'ops'}
    });
  });

  it('denies with the policy message', () => {
    expect(
      evaluateAuthorizationReply({
        status_code: 0,
        response_body: encodeReply({allow: false, user: 'alice', message: 'no access'}),
        codec
      })
    ).toEqual({kind: 'deny', status_code: 401, message: 'no access'});
  });

  it('fails instead of allowing when the user cannot be carried in a header', () => {
    for (const user of ['alice\r\nx-admin: true', '用户']) {
      expect(
        evaluateAuthorizationReply({status_code: 0, response_body: encodeReply({allow: true, user}), codec})
      ).toEqual({
        kind: 'fail',
        status_code: 500,
        error: {code: 'reply_user_invalid', message: 'Authorization reply user cannot be carried in a header value'}
      });
    }
  });

  it('allows latin-1 users unchanged', () => {
    expect(
      evaluateAuthorizationReply({status_code: 0, response_body: encodeReply({allow: true, user: 'josé'}), codec})
    ).toMatchObject({kind: 'allow', user_header_value: 'josé'});
  });

  it('fails on a non-OK status before looking at the body', () => {
    const decision = evaluateAuthorizationReply({
      status_code: 14,
      response_body: encodeReply({allow: true, user: 'alice'}),
      codec
    });

    expect(decision).toEqual({
      kind: 'fail',
      status_code: 500,
      error: {code: 'reply_status_failed', message: 'Authorization call completed with status 14'}
    });
  });

  it('fails when the body is missing or empty', () => {
    for (const responseBody of [undefined, new Uint8Array()]) {
      const decision = evaluateAuthorizationReply({status_code: 0, response_body: responseBody, codec});
      expect(decision).toEqual({
        kind: 'fail',
        status_code: 500,
        error: {code: 'reply_missing', message: 'Authorization call returned no response body'}
      });
    }
  });

  it('fails with the lossy UTF-8 rendering of an undecodable body', () => {
    const decision = evaluateAuthorizationReply({
      status_code: 0,
      response_body: Uint8Array.of(0x12, 0x05, 0x61),
      codec
    });

    expect(decision.kind).toBe('fail');
    if (decision.kind !== 'fail') {
      return;
    }

    expect(decision.error.code).toBe('reply_decode_failed');
    expect(decision.raw_reply).toBe('\u0012\u0005a');
  });
});
