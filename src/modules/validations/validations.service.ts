import { Inject, Injectable, Logger } from '@nestjs/common';
import { RpcException } from '@nestjs/microservices';

import {
  ChecksumKind,
  InvalidReason,
  validateBankAccount,
  validateIdentityNumber,
  ValidationResult,
  validatePhoneNumber,
  validatePostalCode,
} from '../../common/utils';
import { VALIDATOR_OPTIONS } from '../../config/services';
import {
  ValidateBatchDto,
  ValidateIdentityNumberDto,
  ValidateValueDto,
  ValidationItemDto,
} from './dto';
import type { ValidationResponse, ValidationType, ValidatorOptions } from './interfaces';
import {
  bankAccountMessage,
  identityNumberMessage,
  ValidationMessages,
} from './validation-messages';

@Injectable()
export class ValidationsService {
  private readonly logger = new Logger(ValidationsService.name);

  constructor(@Inject(VALIDATOR_OPTIONS) private readonly options: ValidatorOptions) {}

  validateIdentityNumber(payload: ValidateIdentityNumberDto): ValidationResponse {
    try {
      const onlyNif = payload.onlyNif ?? this.options.onlyNifByDefault;
      const result = validateIdentityNumber(payload.value, onlyNif);

      return this.toResponse('identity', result, (reason) =>
        identityNumberMessage(reason, onlyNif),
      );
    } catch (error) {
      throw this.handleError(error);
    }
  }

  validateBankAccount(payload: ValidateValueDto): ValidationResponse {
    try {
      return this.toResponse('bankAccount', validateBankAccount(payload.value), bankAccountMessage);
    } catch (error) {
      throw this.handleError(error);
    }
  }

  validatePostalCode(payload: ValidateValueDto): ValidationResponse {
    const value = payload.value.trim();
    return this.toBooleanResponse(
      'postalCode',
      value,
      validatePostalCode(value),
      ValidationMessages.invalidPostalCode,
    );
  }

  validatePhoneNumber(payload: ValidateValueDto): ValidationResponse {
    const value = payload.value.trim();
    return this.toBooleanResponse(
      'phoneNumber',
      value,
      validatePhoneNumber(value),
      ValidationMessages.invalidPhoneNumber,
    );
  }

  validateBatch(payload: ValidateBatchDto): ValidationResponse[] {
    const responses = payload.items.map((item) => this.validateItem(item));
    const rejected = responses.filter((response) => !response.valid).length;

    this.logger.log(`Batch of ${responses.length} values validated, ${rejected} rejected`);
    return responses;
  }

  health() {
    return {
      status: 'ok',
      onlyNifByDefault: this.options.onlyNifByDefault,
    };
  }

  private validateItem(item: ValidationItemDto): ValidationResponse {
    switch (item.type) {
      case 'identity':
        return this.validateIdentityNumber(item);
      case 'bankAccount':
        return this.validateBankAccount(item);
      case 'postalCode':
        return this.validatePostalCode(item);
      case 'phoneNumber':
        return this.validatePhoneNumber(item);
      default:
        throw new RpcException({ status: 400, message: 'Unsupported validation type' });
    }
  }

  private toResponse(
    type: ValidationType,
    result: ValidationResult<ChecksumKind>,
    describe: (reason: InvalidReason) => string,
  ): ValidationResponse {
    if (result.valid) {
      return {
        type,
        valid: true,
        value: result.canonical,
        kind: result.kind,
        reason: null,
        message: null,
      };
    }

    // raw values are not logged
    this.logger.debug(`Rejected ${type}: ${result.reason.code}`);
    return {
      type,
      valid: false,
      value: null,
      kind: result.reason.code === 'checksum_mismatch' ? result.reason.kind : null,
      reason: result.reason.code,
      message: describe(result.reason),
    };
  }

  private toBooleanResponse(
    type: ValidationType,
    value: string,
    isValid: boolean,
    message: string,
  ): ValidationResponse {
    if (!isValid) {
      this.logger.debug(`Rejected ${type}: malformed`);
    }

    return {
      type,
      valid: isValid,
      value: isValid ? value : null,
      kind: null,
      reason: isValid ? null : 'malformed',
      message: isValid ? null : message,
    };
  }

  private handleError(error: unknown): RpcException {
    if (error instanceof RpcException) {
      return error;
    }

    this.logger.error(error);
    return new RpcException({ status: 500, message: 'Internal server error' });
  }
}
