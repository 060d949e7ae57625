/**
 * Test decoder: data files hold their columns as JSON.
 */
export const decode = (data: Buffer, _fileName: string): unknown =>
    JSON.parse(data.toString("utf-8"));
