import { EventEmitter } from 'events';
import type { StageStatus } from './stage';

export interface StageStartEvent {
  runId: string;
  stage: string;
  index: number;
  timestamp: string;
}

export interface StageCompleteEvent extends StageStartEvent {
  status: StageStatus;
  durationMs: number;
  error?: string;
}

export class PipelineEvents extends EventEmitter {
  emitStageStart(event: StageStartEvent): void {
    this.emit('stageStart', event);
  }

  emitStageComplete(event: StageCompleteEvent): void {
    this.emit('stageComplete', event);
  }

  onStageStart(listener: (event: StageStartEvent) => void): this {
    return this.on('stageStart', listener);
  }

  onStageComplete(listener: (event: StageCompleteEvent) => void): this {
    return this.on('stageComplete', listener);
  }
}
