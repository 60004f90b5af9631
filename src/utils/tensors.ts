import * as tf from '@tensorflow/tfjs';

let backendReady: Promise<boolean> | undefined;

/** Pins TFJS to its pure-JS backend; there is no GPU context under Node. */
export function ensureCpuBackend(): Promise<boolean> {
  if (!backendReady) backendReady = tf.setBackend('cpu');
  return backendReady;
}

export type PixelTensor = {
  data: Float32Array;                     // [H, W, 3] float32 in [0, 1], row-major
  shape: [number, number, number];
  mean: number[];                         // per channel
  std: number[];                          // per channel
};

/** Packed 8-bit RGB [H*W*3] → normalized float tensor plus per-channel moments. */
export function pixelsToTensor(rgb: Uint8Array, height: number, width: number): PixelTensor {
  if (rgb.length !== height * width * 3) {
    throw new RangeError(`pixelsToTensor: expected ${height * width * 3} bytes for ${width}x${height} RGB, got ${rgb.length}`);
  }
  const { data, mean, std } = tf.tidy(() => {
    // Inputs [H, W, 3] → float32 [0, 1]
    const xs = tf.tensor3d(Float32Array.from(rgb), [height, width, 3]).div(255);
    const moments = tf.moments(xs, [0, 1]);
    return {
      data: xs.dataSync<'float32'>(),
      mean: Array.from(moments.mean.dataSync()),
      std: Array.from(moments.variance.sqrt().dataSync()),
    };
  });
  return { data, shape: [height, width, 3], mean, std };
}
