import { z } from 'zod';
import { ILogger, IRedactionClient } from '../interfaces/services';
import { ConversationDocument, PollResult, RedactedTurn, RedactionServiceSettings } from '../types/domain';
import { RequestError, ServiceLogicFailure } from '../types/errors';
import { turnItemId } from '../models/Conversation';
import { sleep as defaultSleep, Sleeper } from '../utils/sleep';
import { executeWithRetry } from './RetryPolicy';
import { createAxiosTransport, headerValue, HttpRequest, HttpResponse, HttpTransport, parseRetryAfter } from './HttpTransport';

const RUNNING_STATUSES = new Set(['notStarted', 'running', 'cancelling']);
const FAILED_STATUSES = new Set(['failed', 'cancelled', 'partiallyCompleted']);

const ServiceErrorSchema = z.object({
  code: z.string().optional(),
  message: z.string().optional(),
});

const JobStatusSchema = z.object({
  status: z.string(),
  errors: z.array(ServiceErrorSchema).optional(),
});

const JobResultSchema = z.object({
  status: z.literal('succeeded'),
  tasks: z.object({
    items: z
      .array(
        z.object({
          status: z.string().optional(),
          results: z.object({
            conversations: z
              .array(
                z.object({
                  id: z.string(),
                  conversationItems: z.array(
                    z.object({
                      id: z.string(),
                      redactedContent: z.object({ text: z.string() }),
                    })
                  ),
                })
              )
              .min(1),
          }),
        })
      )
      .min(1),
  }),
});

// Talks to the Azure AI Language analyze-conversations job API.
// Every call goes through the request-level retry loop.
export class RedactionClient implements IRedactionClient {
  constructor(
    private settings: RedactionServiceSettings,
    private logger: ILogger,
    private transport: HttpTransport = createAxiosTransport(settings.timeoutMs),
    private sleep: Sleeper = defaultSleep
  ) {}

  async submit(document: ConversationDocument, signal?: AbortSignal): Promise<string> {
    const url = `${this.settings.endpoint}language/analyze-conversations/jobs?api-version=${this.settings.apiVersion}`;

    const response = await this.send(
      `submit ${document.id}`,
      { method: 'POST', url, headers: this.headers(), body: this.buildRequestBody(document), signal },
      signal
    );

    if (response.status !== 202) {
      throw new ServiceLogicFailure(`Unexpected status ${response.status} submitting ${document.id}`);
    }

    const operationLocation = headerValue(response.headers, 'operation-location');
    if (!operationLocation) {
      throw new ServiceLogicFailure('Job status endpoint not found in response headers.');
    }

    this.logger.info(`Redaction job created for ${document.id}`, { operationLocation });
    return operationLocation;
  }

  async poll(operationHandle: string, signal?: AbortSignal): Promise<PollResult> {
    const response = await this.send(
      'poll',
      { method: 'GET', url: operationHandle, headers: this.headers(), signal },
      signal
    );

    const parsed = JobStatusSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new ServiceLogicFailure(`Malformed job status from ${operationHandle}`);
    }

    const waitHintMs = parseRetryAfter(headerValue(response.headers, 'retry-after'));
    const { status, errors } = parsed.data;

    if (status === 'succeeded') {
      return { status: 'succeeded', waitHintMs };
    }
    if (FAILED_STATUSES.has(status)) {
      const detail = errors?.map((e) => e.message ?? e.code).filter(Boolean).join('; ');
      return { status: 'failed', waitHintMs, error: detail ? `Job ${status}: ${detail}` : `Job ${status}` };
    }
    if (!RUNNING_STATUSES.has(status)) {
      this.logger.warn('Unknown job status, treating as still running', { status, operationHandle });
    }
    return { status: 'running', waitHintMs };
  }

  async fetchResult(operationHandle: string, signal?: AbortSignal): Promise<RedactedTurn[]> {
    const response = await this.send(
      'fetch result',
      { method: 'GET', url: operationHandle, headers: this.headers(), signal },
      signal
    );

    const parsed = JobResultSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new ServiceLogicFailure(`Unexpected result payload from ${operationHandle}: ${parsed.error.issues[0]?.message}`);
    }

    const [task] = parsed.data.tasks.items;
    if (task.status !== undefined && task.status !== 'succeeded') {
      throw new ServiceLogicFailure(`Redaction task ended with status ${task.status}`);
    }

    const [conversation] = task.results.conversations;
    return conversation.conversationItems.map((item) => ({
      id: item.id,
      text: item.redactedContent.text,
    }));
  }

  private async send(operation: string, request: HttpRequest, signal?: AbortSignal): Promise<HttpResponse> {
    return executeWithRetry(
      async () => {
        const response = await this.transport(request);
        this.throwForStatus(operation, response);
        return response;
      },
      { operation, settings: this.settings.retry, logger: this.logger, signal, sleep: this.sleep }
    );
  }

  // 429 and 5xx are worth retrying, any other 4xx means the request itself is wrong
  private throwForStatus(operation: string, response: HttpResponse): void {
    const { status } = response;
    if (status < 400) return;

    const message = `${operation} returned HTTP ${status}${this.describeBody(response.data)}`;
    if (status === 429 || status >= 500) {
      throw RequestError.transient(message, {
        status,
        retryAfterMs: parseRetryAfter(headerValue(response.headers, 'retry-after')),
      });
    }
    throw RequestError.permanent(message, { status });
  }

  private describeBody(data: unknown): string {
    const parsed = z.object({ error: ServiceErrorSchema }).safeParse(data);
    if (parsed.success && parsed.data.error.message) {
      return `: ${parsed.data.error.message}`;
    }
    return '';
  }

  private headers(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      'Ocp-Apim-Subscription-Key': this.settings.apiKey,
    };
  }

  private buildRequestBody(document: ConversationDocument) {
    return {
      kind: 'Conversation',
      analysisInput: {
        conversations: [
          {
            id: document.id,
            language: this.settings.language,
            modality: 'text',
            conversationItems: document.turns.map((turn, index) => ({
              participantId: turn.participantId,
              id: turnItemId(index),
              text: turn.text,
            })),
          },
        ],
      },
      tasks: [
        {
          kind: 'ConversationalPIITask',
          parameters: {
            modelVersion: 'latest',
            piiCategories: [],
            redactAudioTiming: false,
            redactionPolicy: {
              policyKind: 'CharacterMask',
              redactionCharacter: this.settings.redactionCharacter,
            },
            redactionSource: 'lexical',
          },
        },
      ],
    };
  }
}
