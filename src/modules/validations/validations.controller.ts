import { Controller } from '@nestjs/common';
import { MessagePattern, Payload } from '@nestjs/microservices';

import { ValidatorSubjects } from '../../config/services';
import { ValidationsService } from './validations.service';
import { ValidateBatchDto, ValidateIdentityNumberDto, ValidateValueDto } from './dto';

@Controller()
export class ValidationsController {
  constructor(private readonly validationsService: ValidationsService) {}

  @MessagePattern(ValidatorSubjects.identity)
  validateIdentityNumber(@Payload() payload: ValidateIdentityNumberDto) {
    return this.validationsService.validateIdentityNumber(payload);
  }

  @MessagePattern(ValidatorSubjects.bankAccount)
  validateBankAccount(@Payload() payload: ValidateValueDto) {
    return this.validationsService.validateBankAccount(payload);
  }

  @MessagePattern(ValidatorSubjects.postalCode)
  validatePostalCode(@Payload() payload: ValidateValueDto) {
    return this.validationsService.validatePostalCode(payload);
  }

  @MessagePattern(ValidatorSubjects.phoneNumber)
  validatePhoneNumber(@Payload() payload: ValidateValueDto) {
    return this.validationsService.validatePhoneNumber(payload);
  }

  @MessagePattern(ValidatorSubjects.batch)
  validateBatch(@Payload() payload: ValidateBatchDto) {
    return this.validationsService.validateBatch(payload);
  }

  @MessagePattern(ValidatorSubjects.health)
  health() {
    return this.validationsService.health();
  }
}
