import { PipelineError, PipelineErrorCode } from '../errors';

export type PipelineState =
    | 'Idle'
    | 'Uploading'
    | 'Detecting'
    | 'Generating'
    | 'Displaying'
    | 'CleaningUp'
    | 'Failed';

const TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
    Idle: ['Uploading'],
    Uploading: ['Detecting', 'Failed'],
    Detecting: ['Generating', 'Failed'],
    Generating: ['Displaying', 'Failed'],
    Displaying: ['CleaningUp', 'Failed'],
    // Cleanup runs after a failure too, including a failed upload whose put may still land.
    Failed: ['CleaningUp'],
    CleaningUp: ['Idle'],
};

export function canTransition(from: PipelineState, to: PipelineState): boolean {
    return TRANSITIONS[from].includes(to);
}

/**
 * Per-image state tracker. Records every state it passes through so the
 * caller can show where a leg stopped.
 */
export class LegStateMachine {
    private current: PipelineState = 'Idle';
    private readonly history: PipelineState[] = ['Idle'];

    get state(): PipelineState {
        return this.current;
    }

    get states(): PipelineState[] {
        return [...this.history];
    }

    get hasFailed(): boolean {
        return this.history.includes('Failed');
    }

    transition(to: PipelineState): void {
        if (!canTransition(this.current, to)) {
            throw new PipelineError(
                PipelineErrorCode.INTERNAL_ERROR,
                `Illegal pipeline transition ${this.current} -> ${to}`
            );
        }
        this.current = to;
        this.history.push(to);
    }
}
