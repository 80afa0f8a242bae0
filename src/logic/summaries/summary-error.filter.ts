import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';
import { RemoteError, SummaryError } from './errors';

export interface SummaryErrorBody {
    statusCode: number;
    error: string;
    code: string;
    message: string;
    attempts?: number;
}

export function statusFor(error: SummaryError): HttpStatus {
    switch (error.kind) {
        case 'validation':
            return error.code === 'FileTooLarge' ? HttpStatus.PAYLOAD_TOO_LARGE : HttpStatus.BAD_REQUEST;
        case 'state':
            return error.code === 'SessionNotFound' ? HttpStatus.NOT_FOUND : HttpStatus.CONFLICT;
        case 'navigation':
            return error.code === 'OutOfRange' ? HttpStatus.BAD_REQUEST : HttpStatus.CONFLICT;
        case 'remote':
            return error instanceof RemoteError && error.retryable ? HttpStatus.SERVICE_UNAVAILABLE : HttpStatus.BAD_GATEWAY;
    }
}

export function toErrorBody(error: SummaryError): SummaryErrorBody {
    const body: SummaryErrorBody = {
        statusCode: statusFor(error),
        error: error.name,
        code: error.code,
        message: error.message,
    };
    if (error instanceof RemoteError) {
        body.attempts = error.attempts;
    }
    return body;
}

@Catch(SummaryError)
export class SummaryErrorFilter implements ExceptionFilter {
    private readonly logger = new Logger(SummaryErrorFilter.name);

    catch(exception: SummaryError, host: ArgumentsHost) {
        const body = toErrorBody(exception);
        if (body.statusCode >= 500) {
            this.logger.error(`${exception.name} ${exception.code}: ${exception.message}`);
        }
        host.switchToHttp().getResponse<Response>().status(body.statusCode).json(body);
    }
}
