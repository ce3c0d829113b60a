import { Controller, Get } from '@nestjs/common';
import { SkipThrottle } from '@nestjs/throttler';
import { AppService } from './app.service';
import { HealthResponse } from './models/api.interface';

@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  /**
   * Application health check endpoint. Not rate limited.
   */
  @Get('health')
  @SkipThrottle()
  getHealth(): HealthResponse {
    return this.appService.getHealth();
  }
}
