import type {
  ChatSession,
  DiarizationModel,
  RemoteAssetHandle,
  RemoteAssetState,
} from '../../core/dubbing-engine/types'
import type { GeminiClient, GeminiFile } from './GeminiClient'

export function toRemoteAssetState(state: string): RemoteAssetState {
  if (state === 'ACTIVE') return 'active'
  if (state === 'FAILED') return 'failed'
  return 'pending'
}

function toHandle(file: GeminiFile): RemoteAssetHandle {
  return {
    name: file.name,
    uri: file.uri,
    mimeType: file.mimeType,
    state: toRemoteAssetState(file.state),
  }
}

/**
 * Speaker diarization through Gemini: the media is uploaded as a file and attached to the
 * first turn of the chat.
 */
export class GeminiDiarizationModel implements DiarizationModel {
  constructor(private readonly client: GeminiClient) {}

  async uploadAsset(filePath: string): Promise<RemoteAssetHandle> {
    return toHandle(await this.client.uploadFile(filePath))
  }

  async queryStatus(handle: RemoteAssetHandle): Promise<RemoteAssetState> {
    const file = await this.client.getFile(handle.name)
    return toRemoteAssetState(file.state)
  }

  async startSession(params: { asset: RemoteAssetHandle; systemInstruction: string }): Promise<ChatSession> {
    return this.client.startChat({
      systemInstruction: params.systemInstruction,
      history: [
        {
          role: 'user',
          parts: [{ fileData: { mimeType: params.asset.mimeType, fileUri: params.asset.uri } }],
        },
      ],
    })
  }
}
