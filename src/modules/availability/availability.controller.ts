import {
  BadRequestException,
  Controller,
  Get,
  NotFoundException,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { formatNaiveDateTime } from '../../common/time/naive-datetime.js';
import { AvailabilityService } from './availability.service.js';
import { AvailabilityQuerySchema } from './dto/availability-query.dto.js';

const NOT_APPLICABLE_MESSAGES = {
  'service-not-found': 'Service not found',
  'employee-not-assigned': 'Employee is not assigned to this service',
} as const;

@ApiTags('Availability')
@Controller('availability')
export class AvailabilityController {
  constructor(private readonly availabilityService: AvailabilityService) {}

  @Get()
  @ApiOperation({
    summary: 'List free start times for an employee and service on a day',
  })
  @ApiQuery({ name: 'employee_id', type: Number, required: true })
  @ApiQuery({ name: 'service_id', type: Number, required: true })
  @ApiQuery({
    name: 'day',
    type: String,
    required: true,
    description: 'YYYY-MM-DD',
  })
  async findSlots(@Query() query: unknown): Promise<string[]> {
    const parsed = AvailabilityQuerySchema.safeParse(query);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.flatten());
    }

    const result = await this.availabilityService.availableSlots(
      parsed.data.employee_id,
      parsed.data.service_id,
      parsed.data.day,
    );

    if (result.kind === 'not-applicable') {
      throw new NotFoundException(NOT_APPLICABLE_MESSAGES[result.reason]);
    }
    return result.slots.map(formatNaiveDateTime);
  }
}
