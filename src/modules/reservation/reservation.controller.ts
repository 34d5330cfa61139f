import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../identity/guards/jwt-auth.guard.js';
import { CurrentAccount } from '../identity/decorators/current-account.decorator.js';
import type { AccountPrincipal } from '../identity/account-principal.js';
import { ReservationService } from './reservation.service.js';
import { CreateReservationSchema } from './dto/create-reservation.dto.js';
import { UpdateReservationStatusSchema } from './dto/update-reservation-status.dto.js';
import {
  toDetailsResponse,
  toListingResponse,
  toReservationResponse,
  type ReservationDetailsResponse,
  type ReservationListingResponse,
  type ReservationResponse,
} from './reservation.presenter.js';

@ApiTags('Reservations')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard)
@Controller('reservations')
export class ReservationController {
  constructor(private readonly reservationService: ReservationService) {}

  @Post()
  @ApiOperation({ summary: 'Book a free slot' })
  async create(
    @CurrentAccount() principal: AccountPrincipal,
    @Body() body: unknown,
  ): Promise<ReservationResponse> {
    const parsed = CreateReservationSchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.flatten());
    }
    const reservation = await this.reservationService.createReservation(
      principal,
      parsed.data,
    );
    return toReservationResponse(reservation);
  }

  @Get('client')
  @ApiOperation({ summary: "List the signed-in client's reservations" })
  async listForClient(
    @CurrentAccount() principal: AccountPrincipal,
  ): Promise<ReservationListingResponse[]> {
    const listings = await this.reservationService.listForClient(principal);
    return listings.map(toListingResponse);
  }

  @Get('company')
  @ApiOperation({ summary: "List the signed-in company's reservations" })
  async listForCompany(
    @CurrentAccount() principal: AccountPrincipal,
  ): Promise<ReservationListingResponse[]> {
    const listings = await this.reservationService.listForCompany(principal);
    return listings.map(toListingResponse);
  }

  @Get('company/:employeeId')
  @ApiOperation({
    summary: 'List reservations of one of the company employees',
  })
  async listForEmployee(
    @CurrentAccount() principal: AccountPrincipal,
    @Param('employeeId', ParseIntPipe) employeeId: number,
  ): Promise<ReservationListingResponse[]> {
    const listings = await this.reservationService.listForEmployee(
      principal,
      employeeId,
    );
    return listings.map(toListingResponse);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a reservation by ID' })
  async findOne(
    @CurrentAccount() principal: AccountPrincipal,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<ReservationDetailsResponse> {
    const reservation = await this.reservationService.getReservation(
      principal,
      id,
    );
    return toDetailsResponse(reservation);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Change the status of a reservation' })
  async updateStatus(
    @CurrentAccount() principal: AccountPrincipal,
    @Param('id', ParseIntPipe) id: number,
    @Body() body: unknown,
  ): Promise<ReservationResponse> {
    const parsed = UpdateReservationStatusSchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.flatten());
    }
    const reservation = await this.reservationService.updateStatus(
      principal,
      id,
      parsed.data.status,
    );
    return toReservationResponse(reservation);
  }
}
