export const max0 = (x: number) => Math.max(0, x);

// 金额
export const round2 = (x: number) => Math.round((x + Number.EPSILON) * 100) / 100;

// 工时，避免累加时的浮点漂移
export const round4 = (x: number) => Math.round((x + Number.EPSILON) * 10_000) / 10_000;

export const mod = (n: number, m: number) => ((n % m) + m) % m;
