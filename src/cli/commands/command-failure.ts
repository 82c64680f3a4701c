import { Logger } from '@nestjs/common';
import {
  FuturesApiException,
  FuturesConnectionException,
  FuturesRateLimitException,
  InvalidFuturesApiKeyException,
  MissingCredentialsException,
  OrderValidationException,
} from '../../modules/futures-orders/exceptions/futures.exceptions';
import { CliOutput } from '../presentation/cli-output';
import { ConfirmationUnavailableError } from '../presentation/confirm.prompt';
import { TerminalRenderer } from '../presentation/terminal.renderer';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

/**
 * Prints a failed invocation and returns the process exit code.
 * Exchange messages are shown as the exchange sent them.
 */
export function reportFailure(
  error: unknown,
  renderer: TerminalRenderer,
  output: CliOutput,
  logger: Logger,
): number {
  if (error instanceof OrderValidationException) {
    output.printError(renderer.validationErrors(error.errors));
    return EXIT_FAILURE;
  }

  if (error instanceof MissingCredentialsException) {
    output.printError(renderer.error('Configuration Error', error.message));
    return EXIT_FAILURE;
  }

  if (error instanceof InvalidFuturesApiKeyException) {
    output.printError(renderer.error('Authentication Error', withCode(error)));
    return EXIT_FAILURE;
  }

  if (error instanceof FuturesRateLimitException) {
    output.printError(renderer.error('Rate Limit Error', withCode(error)));
    return EXIT_FAILURE;
  }

  if (error instanceof FuturesApiException) {
    output.printError(renderer.error('API Error', `Binance API returned an error:\n${withCode(error)}`));
    return EXIT_FAILURE;
  }

  if (error instanceof FuturesConnectionException) {
    output.printError(renderer.error('Connection Error', error.message));
    return EXIT_FAILURE;
  }

  if (error instanceof ConfirmationUnavailableError) {
    output.printError(renderer.error('Confirmation Required', error.message));
    return EXIT_FAILURE;
  }

  const err = error instanceof Error ? error : new Error(String(error));
  logger.error(`Unexpected failure: ${err.message}`, err.stack);
  output.printError(renderer.error('Unexpected Error', err.message));
  return EXIT_FAILURE;
}

function withCode(error: FuturesApiException): string {
  return error.code !== undefined ? `${error.message} (code ${error.code})` : error.message;
}
