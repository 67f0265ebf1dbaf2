export interface FrameShape {
    width: number;
    height: number;
    channels: number;
    dataLength: number;
}

export class InputShapeError extends Error {
    constructor(public readonly shape: FrameShape, detail?: string) {
        super(
            `Invalid frame ${shape.width}x${shape.height}x${shape.channels} (${shape.dataLength} bytes)` +
                (detail ? `: ${detail}` : '')
        );
        this.name = 'InputShapeError';
    }
}

export const isInputShapeError = (error: unknown): error is InputShapeError => error instanceof InputShapeError;

export class ParameterNameError extends Error {
    constructor(public readonly parameterName: string) {
        super(`Unknown grading parameter '${parameterName}'`);
        this.name = 'ParameterNameError';
    }
}

export const isParameterNameError = (error: unknown): error is ParameterNameError =>
    error instanceof ParameterNameError;
