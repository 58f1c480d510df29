import type { ResilienceOrchestrator } from '../../resilience/orchestrator.js';
import type { HttpRequest, QueryParams, RequestOptions } from '../../types/common.js';
import { RequestBuilder } from '../../transport/request-builder.js';
import { InvalidArgumentError } from '../../errors/categories.js';
import type { CreateRunRequest } from './request.js';
import type { CreateRunRequestBody } from './schema.js';
import { RunRequestValidator } from './validation.js';
import type { RunStreamEvent } from './stream.js';
import type {
  Run,
  RunListParams,
  RunListResponse,
  RunStep,
  RunStepListResponse,
  RunSubmitToolOutputsRequest,
  RunUpdateRequest,
} from './types.js';

const BETA_HEADERS = { 'OpenAI-Beta': 'assistants=v2' } as const;

export interface RunCreateOptions extends RequestOptions {
  /** Sends the request on behalf of this assistant instead of the one it was built with. */
  assistantId?: string;
}

export interface RunsService {
  create(threadId: string, request: CreateRunRequest, options?: RunCreateOptions): Promise<Run>;
  stream(threadId: string, request: CreateRunRequest, options?: RunCreateOptions): AsyncIterable<RunStreamEvent>;
  retrieve(threadId: string, runId: string, options?: RequestOptions): Promise<Run>;
  update(threadId: string, runId: string, request: RunUpdateRequest, options?: RequestOptions): Promise<Run>;
  cancel(threadId: string, runId: string, options?: RequestOptions): Promise<Run>;
  list(threadId: string, params?: RunListParams, options?: RequestOptions): Promise<RunListResponse>;
  submitToolOutputs(threadId: string, runId: string, request: RunSubmitToolOutputsRequest, options?: RequestOptions): Promise<Run>;
  submitToolOutputsStream(threadId: string, runId: string, request: RunSubmitToolOutputsRequest, options?: RequestOptions): AsyncIterable<RunStreamEvent>;
  listSteps(threadId: string, runId: string, params?: RunListParams, options?: RequestOptions): Promise<RunStepListResponse>;
  retrieveStep(threadId: string, runId: string, stepId: string, options?: RequestOptions): Promise<RunStep>;
}

export interface RunsServiceOptions {
  /** Check documented limits locally before sending. */
  validateRequests?: boolean;
}

export class RunsServiceImpl implements RunsService {
  private readonly validateRequests: boolean;

  constructor(
    private readonly orchestrator: ResilienceOrchestrator,
    options: RunsServiceOptions = {}
  ) {
    this.validateRequests = options.validateRequests ?? false;
  }

  async create(threadId: string, request: CreateRunRequest, options?: RunCreateOptions): Promise<Run> {
    const body = this.prepare(request, false, options);
    const httpRequest = this.builder('POST', options, 'threads', threadId, 'runs')
      .setBody(body)
      .build();

    return this.orchestrator.request<Run>(httpRequest);
  }

  /** Validation runs here, before the stream is first iterated. */
  stream(threadId: string, request: CreateRunRequest, options?: RunCreateOptions): AsyncIterable<RunStreamEvent> {
    const body = this.prepare(request, true, options);
    const httpRequest = this.builder('POST', options, 'threads', threadId, 'runs')
      .setBody(body)
      .build();

    return this.events(httpRequest);
  }

  async retrieve(threadId: string, runId: string, options?: RequestOptions): Promise<Run> {
    const httpRequest = this.builder('GET', options, 'threads', threadId, 'runs', runId).build();
    return this.orchestrator.request<Run>(httpRequest);
  }

  async update(threadId: string, runId: string, request: RunUpdateRequest, options?: RequestOptions): Promise<Run> {
    const httpRequest = this.builder('POST', options, 'threads', threadId, 'runs', runId)
      .setBody(request)
      .build();
    return this.orchestrator.request<Run>(httpRequest);
  }

  async cancel(threadId: string, runId: string, options?: RequestOptions): Promise<Run> {
    const httpRequest = this.builder('POST', options, 'threads', threadId, 'runs', runId, 'cancel').build();
    return this.orchestrator.request<Run>(httpRequest);
  }

  async list(threadId: string, params?: RunListParams, options?: RequestOptions): Promise<RunListResponse> {
    const httpRequest = this.builder('GET', options, 'threads', threadId, 'runs')
      .setQuery(paginationQuery(params))
      .build();
    return this.orchestrator.request<RunListResponse>(httpRequest);
  }

  async submitToolOutputs(
    threadId: string,
    runId: string,
    request: RunSubmitToolOutputsRequest,
    options?: RequestOptions
  ): Promise<Run> {
    const httpRequest = this.builder('POST', options, 'threads', threadId, 'runs', runId, 'submit_tool_outputs')
      .setBody({ ...request, stream: false })
      .build();
    return this.orchestrator.request<Run>(httpRequest);
  }

  submitToolOutputsStream(
    threadId: string,
    runId: string,
    request: RunSubmitToolOutputsRequest,
    options?: RequestOptions
  ): AsyncIterable<RunStreamEvent> {
    const httpRequest = this.builder('POST', options, 'threads', threadId, 'runs', runId, 'submit_tool_outputs')
      .setBody({ ...request, stream: true })
      .build();
    return this.events(httpRequest);
  }

  async listSteps(
    threadId: string,
    runId: string,
    params?: RunListParams,
    options?: RequestOptions
  ): Promise<RunStepListResponse> {
    const httpRequest = this.builder('GET', options, 'threads', threadId, 'runs', runId, 'steps')
      .setQuery(paginationQuery(params))
      .build();
    return this.orchestrator.request<RunStepListResponse>(httpRequest);
  }

  async retrieveStep(threadId: string, runId: string, stepId: string, options?: RequestOptions): Promise<RunStep> {
    const httpRequest = this.builder('GET', options, 'threads', threadId, 'runs', runId, 'steps', stepId).build();
    return this.orchestrator.request<RunStep>(httpRequest);
  }

  private prepare(request: CreateRunRequest, stream: boolean, options?: RunCreateOptions): CreateRunRequestBody {
    const assistantId = options?.assistantId ?? request.assistantId;
    if (assistantId.trim() === '') {
      throw new InvalidArgumentError('assistant_id is required', { param: 'assistant_id' });
    }
    if (assistantId !== request.assistantId) {
      request.rebindAssistant(assistantId);
    }
    if (this.validateRequests) {
      RunRequestValidator.validate(request);
    }
    request.setStreaming(stream);
    return request.toJSON();
  }

  private builder(method: 'GET' | 'POST', options: RequestOptions | undefined, ...segments: string[]): RequestBuilder {
    const { headers, signal, timeout } = options ?? {};
    return RequestBuilder.create()
      .setMethod(method)
      .setPath('v1', ...segments)
      .setHeaders(BETA_HEADERS)
      .setOptions({ headers, signal, timeout });
  }

  private async *events(httpRequest: HttpRequest): AsyncIterable<RunStreamEvent> {
    for await (const chunk of this.orchestrator.stream<unknown>(httpRequest)) {
      yield { event: chunk.event ?? 'message', data: chunk.data };
    }
  }
}

function paginationQuery(params?: RunListParams): QueryParams {
  return {
    limit: params?.limit,
    order: params?.order,
    after: params?.after,
    before: params?.before,
  };
}
