import type { AuthEventInput, AuthEventSink, AuthEventType, AuthMailer, AuthMailMessage, TokenPurpose } from '@latchkey/auth';

export class RecordingMailer implements AuthMailer {
  readonly deliveries: AuthMailMessage[] = [];
  failWith: Error | null = null;

  async deliver(message: AuthMailMessage): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.deliveries.push(message);
  }

  deliveriesFor(purpose: TokenPurpose): AuthMailMessage[] {
    return this.deliveries.filter((delivery) => delivery.purpose === purpose);
  }

  /** @throws when nothing was delivered for `purpose` */
  lastTokenFor(purpose: TokenPurpose): string {
    const delivery = this.deliveriesFor(purpose).at(-1);
    if (!delivery) {
      throw new Error(`No ${purpose} mail was delivered`);
    }
    return delivery.token;
  }
}

export class RecordingEventSink implements AuthEventSink {
  readonly events: AuthEventInput[] = [];

  emit(event: AuthEventInput): void {
    this.events.push(event);
  }

  types(): AuthEventType[] {
    return this.events.map((event) => event.type);
  }

  ofType(type: AuthEventType): AuthEventInput[] {
    return this.events.filter((event) => event.type === type);
  }
}
