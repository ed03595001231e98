import { PublishCommand, type SNSClient } from '@aws-sdk/client-sns';
import type { Alert, Signal } from '@domain/post-market-monitoring';
import { fail, ok, type Result } from '@shared/result';
import type { MonitoringNotifier } from './types';

export type SnsPublisher = Pick<SNSClient, 'send'>;

export interface SnsTopics {
  readonly alertTopicArn?: string;
  readonly signalTopicArn?: string;
}

const snsPayload = (message: Record<string, unknown>) => ({
  Message: JSON.stringify(message),
  MessageAttributes: {
    origin: {
      DataType: 'String',
      StringValue: 'post-market-monitor',
    },
  },
});

export class SnsMonitoringNotifier implements MonitoringNotifier {
  constructor(
    private readonly sns: SnsPublisher,
    private readonly topics: SnsTopics,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async publishAlert(alert: Alert): Promise<Result<void, Error>> {
    return this.publish(this.topics.alertTopicArn, 'alert-topic-empty', {
      kind: 'alert',
      ...alert,
    });
  }

  async publishSignal(signal: Signal): Promise<Result<void, Error>> {
    return this.publish(this.topics.signalTopicArn, 'signal-topic-empty', {
      kind: 'signal',
      ...signal,
    });
  }

  private async publish(
    topicArn: string | undefined,
    missing: string,
    payload: Record<string, unknown>,
  ): Promise<Result<void, Error>> {
    if (!topicArn) return fail(new Error(missing));
    try {
      const message = snsPayload({ ...payload, publishedAt: this.now().toISOString() });
      await this.sns.send(
        new PublishCommand({
          TopicArn: topicArn,
          Message: message.Message,
          MessageAttributes: message.MessageAttributes,
        }),
      );
      return ok(undefined);
    } catch (error) {
      return fail(error instanceof Error ? error : new Error('sns-publish-failed'));
    }
  }
}
