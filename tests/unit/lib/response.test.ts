import { MailboxConfigurationError, MailboxInputError } from '../../../src/lib/errors';
import { handleError, successResponse } from '../../../src/lib/response';

jest.mock('../../../src/lib/logger');

const expectedHeaders = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': '*',
  'Access-Control-Allow-Methods': 'POST, OPTIONS',
};

describe('API responses', () => {
  it('should encode the body as a JSON string', () => {
    expect(successResponse()).toEqual({
      statusCode: 200,
      headers: expectedHeaders,
      body: '"Success"',
    });
  });

  it('should map input errors to 400', () => {
    const response = handleError(new MailboxInputError('Invalid mailbox status.'));

    expect(response.statusCode).toBe(400);
    expect(response.body).toBe('"Invalid mailbox status."');
  });

  it('should map configuration errors to 500', () => {
    const response = handleError(new MailboxConfigurationError(['MAILBOX_SNS_ARN']));

    expect(response.statusCode).toBe(500);
    expect(response.body).toBe(
      '"MAILBOX_SNS_ARN and MAILBOX_DYNAMODB_TABLE environment variables are required."'
    );
  });

  it('should hide unexpected error details', () => {
    const response = handleError(new Error('boom'));

    expect(response.statusCode).toBe(500);
    expect(response.body).toBe('"An unexpected error occurred"');
  });
});
