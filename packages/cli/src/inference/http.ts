import { z } from 'zod';
import {
    ExternalServiceError,
    errorMessage,
    type EntityRecognizer,
    type EntitySpan,
    type LabelClassifier,
    type ZeroShotResult,
} from '@spendwise/core';
import { ZeroShotResultSchema, type InferenceSettings } from '@spendwise/shared';

export interface HttpServiceConfig {
    endpoint: string;
    model: string;
    token: string;
    timeoutMs: number;
}

export interface InferenceServices {
    classifier: LabelClassifier | null;
    recognizer: EntityRecognizer | null;
    /** Why a service is absent, for display. */
    notes: string[];
}

// Token-classification output with aggregation_strategy=simple
const RecognizedEntitySchema = z.object({
    word: z.string(),
    entity_group: z.string().optional(),
    score: z.number().optional(),
    start: z.number().int().nullable().optional(),
    end: z.number().int().nullable().optional(),
});

const RecognizerResponseSchema = z.array(RecognizedEntitySchema);

/**
 * POST a JSON body to `<endpoint>/<model>` and validate the reply.
 * Network errors, non-2xx statuses, timeouts and unexpected bodies all become
 * ExternalServiceError.
 */
async function postInference<T>(
    service: string,
    config: HttpServiceConfig,
    body: unknown,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
    const url = `${config.endpoint.replace(/\/+$/, '')}/${config.model}`;

    let response: Response;
    try {
        response = await fetch(url, {
            method: 'POST',
            headers: {
                Authorization: `Bearer ${config.token}`,
                'Content-Type': 'application/json',
            },
            body: JSON.stringify(body),
            signal: AbortSignal.timeout(config.timeoutMs),
        });
    } catch (err) {
        throw new ExternalServiceError(service, errorMessage(err), { cause: err });
    }

    if (!response.ok) {
        throw new ExternalServiceError(service, `HTTP ${response.status} ${response.statusText}`.trim());
    }

    let data: unknown;
    try {
        data = await response.json();
    } catch (err) {
        throw new ExternalServiceError(service, 'response is not JSON', { cause: err });
    }

    const result = schema.safeParse(data);
    if (!result.success) {
        throw new ExternalServiceError(service, 'unexpected response shape', { cause: result.error });
    }
    return result.data;
}

/**
 * Zero-shot classifier behind a hosted inference endpoint.
 */
export class HttpLabelClassifier implements LabelClassifier {
    readonly name: string;

    constructor(private readonly config: HttpServiceConfig) {
        this.name = config.model;
    }

    classify(text: string, candidateLabels: readonly string[]): Promise<ZeroShotResult> {
        return postInference(
            this.name,
            this.config,
            { inputs: text, parameters: { candidate_labels: [...candidateLabels] } },
            ZeroShotResultSchema
        );
    }
}

/**
 * Named-entity recognizer behind a hosted inference endpoint.
 */
export class HttpEntityRecognizer implements EntityRecognizer {
    readonly name: string;

    constructor(private readonly config: HttpServiceConfig) {
        this.name = config.model;
    }

    async recognize(text: string): Promise<EntitySpan[]> {
        const entities = await postInference(
            this.name,
            this.config,
            { inputs: text, parameters: { aggregation_strategy: 'simple' } },
            RecognizerResponseSchema
        );

        return entities.map(entity => {
            const span: EntitySpan = { text: entity.word };
            if (entity.entity_group !== undefined) span.label = entity.entity_group;
            if (entity.score !== undefined) span.score = entity.score;
            if (typeof entity.start === 'number') span.start = entity.start;
            if (typeof entity.end === 'number') span.end = entity.end;
            return span;
        });
    }
}

/**
 * Build the configured inference clients.
 * A service is null when disabled, when running offline, or when no token is set.
 */
export function createInferenceServices(
    settings: InferenceSettings,
    env: NodeJS.ProcessEnv = process.env,
    offline = false
): InferenceServices {
    if (offline) {
        return { classifier: null, recognizer: null, notes: ['Offline: inference services disabled'] };
    }

    const notes: string[] = [];
    const token = env[settings.token_env]?.trim();
    if (!token) {
        notes.push(`No API token in ${settings.token_env}; using keyword rules only`);
        return { classifier: null, recognizer: null, notes };
    }

    const base = { endpoint: settings.endpoint, token, timeoutMs: settings.timeout_ms };

    let classifier: LabelClassifier | null = null;
    if (settings.classifier.enabled) {
        classifier = new HttpLabelClassifier({ ...base, model: settings.classifier.model });
    } else {
        notes.push('Zero-shot classifier disabled in settings');
    }

    let recognizer: EntityRecognizer | null = null;
    if (settings.recognizer.enabled) {
        recognizer = new HttpEntityRecognizer({ ...base, model: settings.recognizer.model });
    } else {
        notes.push('Entity recognizer disabled in settings');
    }

    return { classifier, recognizer, notes };
}
