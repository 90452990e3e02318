// Duration constants (all ms)
export const SECOND = 1000;
export const MINUTE = 60 * SECOND;

export enum colors {
    red = 0xed2d2d, // red
}
