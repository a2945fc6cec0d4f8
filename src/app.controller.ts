import { Controller, Get } from '@nestjs/common';

@Controller()
export class AppController {
  /** GET /health → 프로세스 생존 확인 */
  @Get('health')
  getHealth(): string {
    return 'ok';
  }
}
