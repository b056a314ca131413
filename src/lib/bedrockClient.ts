import { BedrockRuntimeClient, InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';
import { PromptError, describeError } from './errors.js';

export interface InvokeModelParams {
  modelId: string;
  body: string;
  accept: 'application/json';
  contentType: 'application/json';
}

/** The single remote call this tool makes. Resolves to the raw response body bytes. */
export type InvokeModelFn = (params: InvokeModelParams) => Promise<Uint8Array>;

export function createBedrockClient(region: string): BedrockRuntimeClient {
  return new BedrockRuntimeClient({ region });
}

export function createBedrockInvoker(region: string, client: BedrockRuntimeClient = createBedrockClient(region)): InvokeModelFn {
  return async (params) => {
    try {
      const resp = await client.send(new InvokeModelCommand(params));
      return resp.body ?? new Uint8Array();
    } catch (e) {
      throw new PromptError('RemoteCallFailure', `An error occurred while invoking the model: ${describeError(e)}`, { cause: e });
    }
  };
}
