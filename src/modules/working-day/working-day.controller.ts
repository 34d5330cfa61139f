import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Put,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../identity/guards/jwt-auth.guard.js';
import { CurrentAccount } from '../identity/decorators/current-account.decorator.js';
import type { AccountPrincipal } from '../identity/account-principal.js';
import { WorkingDayService } from './working-day.service.js';
import { UpsertWorkingDaySchema } from './dto/upsert-working-day.dto.js';

@ApiTags('Working days')
@Controller('working-days')
export class WorkingDayController {
  constructor(private readonly workingDayService: WorkingDayService) {}

  @Put()
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Set the opening hours of one weekday' })
  async upsert(
    @CurrentAccount() principal: AccountPrincipal,
    @Body() body: unknown,
  ) {
    const parsed = UpsertWorkingDaySchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.flatten());
    }
    return this.workingDayService.upsertWorkingDay(principal, parsed.data);
  }

  @Get('company/:companyId')
  @ApiOperation({ summary: "List a company's weekly opening hours" })
  async listForCompany(@Param('companyId', ParseIntPipe) companyId: number) {
    return this.workingDayService.listWorkingDays(companyId);
  }
}
