import OBSWebSocket from 'obs-websocket-js';
import type { ControllerConfig } from '@/lib/config';
import { ControllerError, describeError } from '@/lib/errors';
import { log } from '@/lib/logger';
import { sleep, withTimeout } from '@/lib/result';
import type { PresentationController, SceneItemTransform, SourceKind, SourceSettings } from './controller';

const INPUT_KIND: Record<SourceKind, string> = {
  image: 'image_source',
  media: 'ffmpeg_source',
};

const MAX_CONNECT_ATTEMPTS = 5;
const RETRY_DELAY_MS = 2000;

function namesFrom(items: readonly Record<string, unknown>[], key: string): string[] {
  const out: string[] = [];
  for (const item of items) {
    const name = item[key];
    if (typeof name === 'string') out.push(name);
  }
  return out;
}

/** obs-websocket v5 client; every request is bounded by the configured timeout. */
export class ObsController implements PresentationController {
  private readonly obs = new OBSWebSocket();
  private connected = false;

  constructor(private readonly cfg: ControllerConfig) {
    this.obs.on('ConnectionClosed', (err) => {
      if (this.connected) log(`OBS connection closed: ${err.message || err.code}`, 'warn');
      this.connected = false;
    });
  }

  get url(): string {
    return `ws://${this.cfg.host}:${this.cfg.port}`;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async connect(signal?: AbortSignal): Promise<boolean> {
    for (let attempt = 1; attempt <= MAX_CONNECT_ATTEMPTS; attempt++) {
      try {
        await withTimeout(this.obs.connect(this.url, this.cfg.password), this.cfg.timeoutMs, 'OBS connect');
        this.connected = true;
        const version = await this.request('GetVersion', () => this.obs.call('GetVersion'));
        log(`Connected to OBS ${version.obsVersion} (websocket ${version.obsWebSocketVersion}) at ${this.url}`);
        return true;
      } catch (err) {
        log(`OBS connection attempt ${attempt} failed: ${describeError(err)}`, 'warn');
        if (attempt < MAX_CONNECT_ATTEMPTS && !signal?.aborted) await sleep(RETRY_DELAY_MS * attempt, signal);
        if (signal?.aborted) break;
      }
    }
    log('Failed to connect to OBS after all retries', 'error');
    return false;
  }

  async healthCheck(): Promise<boolean> {
    if (!this.connected) return false;
    try {
      await this.request('GetVersion', () => this.obs.call('GetVersion'));
      return true;
    } catch (err) {
      log(`OBS health check failed: ${describeError(err)}`, 'warn');
      return false;
    }
  }

  async reconnect(signal?: AbortSignal): Promise<boolean> {
    log('Attempting OBS reconnect…');
    await this.disconnect();
    return await this.connect(signal);
  }

  async disconnect(): Promise<void> {
    this.connected = false;
    try {
      await this.obs.disconnect();
    } catch (err) {
      log(`OBS disconnect failed: ${describeError(err)}`, 'debug');
    }
  }

  async createScene(name: string): Promise<void> {
    await this.request(`CreateScene ${name}`, () => this.obs.call('CreateScene', { sceneName: name }));
  }

  async removeScene(name: string): Promise<void> {
    await this.request(`RemoveScene ${name}`, () => this.obs.call('RemoveScene', { sceneName: name }));
  }

  async listScenes(): Promise<string[]> {
    const res = await this.request('GetSceneList', () => this.obs.call('GetSceneList'));
    return namesFrom(res.scenes, 'sceneName');
  }

  async setActiveScene(name: string): Promise<void> {
    await this.request(`SetCurrentProgramScene ${name}`, () => this.obs.call('SetCurrentProgramScene', { sceneName: name }));
  }

  async createSource(scene: string, name: string, kind: SourceKind, settings: SourceSettings): Promise<void> {
    await this.request(`CreateInput ${name}`, () => this.obs.call('CreateInput', {
      sceneName: scene,
      inputName: name,
      inputKind: INPUT_KIND[kind],
      inputSettings: settings,
      sceneItemEnabled: true,
    }));
  }

  async removeSource(name: string): Promise<void> {
    await this.request(`RemoveInput ${name}`, () => this.obs.call('RemoveInput', { inputName: name }));
  }

  async listSources(): Promise<string[]> {
    const res = await this.request('GetInputList', () => this.obs.call('GetInputList'));
    return namesFrom(res.inputs, 'inputName');
  }

  async setSourceMuted(name: string, muted: boolean): Promise<void> {
    await this.request(`SetInputMute ${name}`, () => this.obs.call('SetInputMute', { inputName: name, inputMuted: muted }));
  }

  async getSourceItemId(scene: string, name: string): Promise<number> {
    const res = await this.request(`GetSceneItemId ${name}`, () => this.obs.call('GetSceneItemId', { sceneName: scene, sourceName: name }));
    return res.sceneItemId;
  }

  async setSourceTransform(scene: string, itemId: number, transform: SceneItemTransform): Promise<void> {
    await this.request(`SetSceneItemTransform ${scene}#${itemId}`, () => this.obs.call('SetSceneItemTransform', {
      sceneName: scene,
      sceneItemId: itemId,
      sceneItemTransform: transform,
    }));
  }

  async setTransitionStyle(name: string): Promise<void> {
    await this.request(`SetCurrentSceneTransition ${name}`, () => this.obs.call('SetCurrentSceneTransition', { transitionName: name }));
  }

  private async request<T>(label: string, fn: () => Promise<T>): Promise<T> {
    if (!this.connected) throw new ControllerError(label, 'not connected');
    try {
      return await withTimeout(fn(), this.cfg.timeoutMs, label);
    } catch (err) {
      throw new ControllerError(label, err);
    }
  }
}
