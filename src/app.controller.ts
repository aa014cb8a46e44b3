import { Controller, Get } from '@nestjs/common';

@Controller()
export class AppController {
  @Get()
  health() {
    return {
      status: 'ok',
      message: 'Training Progress API',
      docs: '/api/docs',
      today: '/api/today',
    };
  }
}
