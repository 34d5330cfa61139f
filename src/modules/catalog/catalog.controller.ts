import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Put,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../identity/guards/jwt-auth.guard.js';
import { CurrentAccount } from '../identity/decorators/current-account.decorator.js';
import type { AccountPrincipal } from '../identity/account-principal.js';
import { ServiceCatalogService } from './service-catalog.service.js';
import { CreateServiceSchema } from './dto/create-service.dto.js';
import { UpdateServiceSchema } from './dto/update-service.dto.js';

@ApiTags('Services')
@Controller('services')
export class CatalogController {
  constructor(private readonly catalogService: ServiceCatalogService) {}

  @Get(':id')
  @ApiOperation({ summary: 'Get a service with its assigned employees' })
  async findOne(@Param('id', ParseIntPipe) id: number) {
    return this.catalogService.getService(id);
  }

  @Post()
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Create a service (starts inactive)' })
  async create(
    @CurrentAccount() principal: AccountPrincipal,
    @Body() body: unknown,
  ) {
    const parsed = CreateServiceSchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.flatten());
    }
    return this.catalogService.createService(principal, parsed.data);
  }

  @Patch(':id')
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Update a service' })
  async update(
    @CurrentAccount() principal: AccountPrincipal,
    @Param('id', ParseIntPipe) id: number,
    @Body() body: unknown,
  ) {
    const parsed = UpdateServiceSchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.flatten());
    }
    return this.catalogService.updateService(principal, id, parsed.data);
  }

  @Put(':id/employees/:employeeId')
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Assign an employee to a service' })
  async assign(
    @CurrentAccount() principal: AccountPrincipal,
    @Param('id', ParseIntPipe) id: number,
    @Param('employeeId', ParseIntPipe) employeeId: number,
  ) {
    return this.catalogService.assignEmployee(principal, id, employeeId);
  }

  @Delete(':id/employees/:employeeId')
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Remove an employee from a service' })
  async unassign(
    @CurrentAccount() principal: AccountPrincipal,
    @Param('id', ParseIntPipe) id: number,
    @Param('employeeId', ParseIntPipe) employeeId: number,
  ) {
    return this.catalogService.unassignEmployee(principal, id, employeeId);
  }
}
