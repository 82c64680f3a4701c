import { HttpException, HttpStatus } from '@nestjs/common';

export interface FieldValidationError {
  field: string;
  constraints: string[];
}

export class OrderValidationException extends HttpException {
  constructor(public readonly errors: FieldValidationError[]) {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        message: errors.map((e) => `${e.field}: ${e.constraints.join(', ')}`),
        error: 'OrderValidationException',
      },
      HttpStatus.BAD_REQUEST,
    );
  }
}

export class FuturesApiException extends HttpException {
  constructor(
    message: string,
    public readonly code?: number,
    statusCode: number = HttpStatus.BAD_REQUEST,
  ) {
    super(
      {
        statusCode,
        code,
        message,
        error: 'FuturesApiException',
      },
      statusCode,
    );
  }
}

export class InvalidFuturesApiKeyException extends FuturesApiException {
  constructor(
    message: string = 'Invalid API key or secret for Binance Futures Testnet',
    code?: number,
  ) {
    super(message, code, HttpStatus.UNAUTHORIZED);
  }
}

export class FuturesRateLimitException extends FuturesApiException {
  constructor(
    message: string = 'Rate limit exceeded on Binance Futures Testnet',
    code?: number,
  ) {
    super(message, code, HttpStatus.TOO_MANY_REQUESTS);
  }
}

export class FuturesConnectionException extends HttpException {
  constructor(message: string = 'Failed to connect to Binance Futures Testnet') {
    super(
      {
        statusCode: HttpStatus.SERVICE_UNAVAILABLE,
        message,
        error: 'FuturesConnectionException',
      },
      HttpStatus.SERVICE_UNAVAILABLE,
    );
  }
}

export class MissingCredentialsException extends HttpException {
  constructor(
    message: string = 'BINANCE_API_KEY and BINANCE_API_SECRET must be defined in your .env file. Copy .env.example to .env and fill in your testnet credentials.',
  ) {
    super(
      {
        statusCode: HttpStatus.UNAUTHORIZED,
        message,
        error: 'MissingCredentialsException',
      },
      HttpStatus.UNAUTHORIZED,
    );
  }
}
