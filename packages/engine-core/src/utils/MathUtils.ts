/** 2D vector in world pixels. */
export interface Vec2 {
    x: number;
    y: number;
}

/** Axis-aligned rectangle; `x`/`y` is the top-left corner. */
export interface Rect {
    x: number;
    y: number;
    w: number;
    h: number;
}

/** True when `r` has positive size and lies entirely inside a `width` × `height` area. */
export function rectWithin(r: Rect, width: number, height: number): boolean {
    return r.w > 0 && r.h > 0 && r.x >= 0 && r.y >= 0 && r.x + r.w <= width && r.y + r.h <= height;
}

export function clamp(val: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, val));
}
