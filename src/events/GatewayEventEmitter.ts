import {
  AnyGatewayEvent,
  GatewayEventListener,
  GatewaySubscription,
  GatewaySubscriptionOptions
} from './GatewayEventTypes';
import LibLogger from '../logger';

const logger = LibLogger.get('GatewayEventEmitter');

interface InternalSubscription {
  id: string;
  listener: GatewayEventListener;
  options: GatewaySubscriptionOptions;
  isActive: boolean;
}

/**
 * Dispatches gateway events to subscribers. Listeners run synchronously; a
 * throwing listener is logged and never affects the call that emitted the event.
 */
export class GatewayEventEmitter {
  private subscriptions = new Map<string, InternalSubscription>();
  private nextSubscriptionId = 1;

  public subscribe(
    listener: GatewayEventListener,
    options: GatewaySubscriptionOptions = {}
  ): GatewaySubscription {
    const id = `subscription_${this.nextSubscriptionId++}`;
    this.subscriptions.set(id, { id, listener, options, isActive: true });

    return {
      id,
      unsubscribe: () => {
        this.unsubscribe(id);
      },
      isActive: () => this.subscriptions.get(id)?.isActive ?? false
    };
  }

  public unsubscribe(subscriptionId: string): boolean {
    const subscription = this.subscriptions.get(subscriptionId);
    if (!subscription) {
      return false;
    }
    subscription.isActive = false;
    this.subscriptions.delete(subscriptionId);
    return true;
  }

  public emit(event: AnyGatewayEvent): void {
    let emittedCount = 0;

    for (const subscription of Array.from(this.subscriptions.values())) {
      if (!subscription.isActive) {
        continue;
      }
      const { eventTypes } = subscription.options;
      if (eventTypes && !eventTypes.includes(event.type)) {
        continue;
      }

      try {
        subscription.listener(event);
      } catch (error) {
        logger.error('Event listener threw', {
          component: 'gateway',
          subcomponent: 'GatewayEventEmitter',
          subscriptionId: subscription.id,
          eventType: event.type,
          error: error instanceof Error ? error.message : String(error)
        });
      }
      emittedCount++;
    }

    logger.trace('Event emitted to subscriptions', {
      eventType: event.type,
      totalSubscriptions: this.subscriptions.size,
      emittedCount
    });
  }

  public getSubscriptionCount(): number {
    return this.subscriptions.size;
  }

  public destroy(): void {
    for (const subscription of this.subscriptions.values()) {
      subscription.isActive = false;
    }
    this.subscriptions.clear();
  }
}
