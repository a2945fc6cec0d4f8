import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { OnGatewayConnection, WebSocketGateway, WebSocketServer } from '@nestjs/websockets';
import type { Server, Socket } from 'socket.io';
import { Subscription } from 'rxjs';
import { errorTrace } from '../common/error-trace';
import { SampleStoreService } from '../samples/sample-store.service';
import { StatsService } from './stats.service';
import { toSampleView } from './stats.types';

/**
 * WebSocket 게이트웨이: 새 샘플을 실시간으로 브로드캐스트한다.
 */
@Injectable()
@WebSocketGateway({
  cors: { origin: '*' },
  namespace: 'ups-stats',
})
export class StatsGateway implements OnModuleInit, OnModuleDestroy, OnGatewayConnection {
  @WebSocketServer()
  private server!: Server;

  private readonly logger = new Logger(StatsGateway.name);
  private subscription?: Subscription;

  constructor(
    private readonly store: SampleStoreService,
    private readonly statsService: StatsService,
  ) {}

  onModuleInit(): void {
    this.subscription = this.store.appended$.subscribe((sample) => {
      this.server?.emit('ups-sample', toSampleView(sample));
    });
  }

  /** 새 클라이언트가 붙으면 전체 스냅샷을 한 번 푸시한다. */
  handleConnection(client: Socket): void {
    this.statsService
      .getSnapshot()
      .then((snapshot) => client.emit('ups-stats', snapshot))
      .catch((error: unknown) => this.logger.error('Failed to send initial snapshot', errorTrace(error)));
  }

  onModuleDestroy(): void {
    this.subscription?.unsubscribe();
  }
}
