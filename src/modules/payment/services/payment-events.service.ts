import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { filter, Observable, Subject } from 'rxjs';
import { WebhookEvent } from '../client/payment-client.interface';
import { WebhookEventType } from '../events/payment-events';
import { LoggerService } from '../../../shared/services/logger.service';

/**
 * In-process stream of verified webhook events. Updating local order state
 * is left to subscribers.
 */
@Injectable()
export class PaymentEventsService implements OnModuleDestroy {
  private readonly events = new Subject<WebhookEvent>();

  readonly events$: Observable<WebhookEvent> = this.events.asObservable();

  constructor(private readonly logger: LoggerService) {}

  ofType(type: WebhookEventType | string): Observable<WebhookEvent> {
    return this.events$.pipe(filter((event) => event.type === type));
  }

  publish(event: WebhookEvent): void {
    this.logger.debug(
      `Publishing webhook event ${event.type} for order ${event.orderId}`,
      PaymentEventsService.name,
    );
    this.events.next(event);
  }

  onModuleDestroy(): void {
    this.events.complete();
  }
}
