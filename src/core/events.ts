import { EventEmitter } from 'eventemitter3';
import type { GatehouseEvents } from './types.js';

export class EventBus {
  private emitter = new EventEmitter();

  on<K extends keyof GatehouseEvents>(event: K, listener: (data: GatehouseEvents[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof GatehouseEvents>(event: K, listener: (data: GatehouseEvents[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof GatehouseEvents>(event: K, listener: (data: GatehouseEvents[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends keyof GatehouseEvents>(event: K, data: GatehouseEvents[K]): void {
    this.emitter.emit(event, data);
  }

  listenerCount(event: keyof GatehouseEvents): number {
    return this.emitter.listenerCount(event);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
