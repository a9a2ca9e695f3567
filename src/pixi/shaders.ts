// GLSL ES 1.00, so the pipeline runs on any WebGL 1 context.

export const VERTEX_SHADER = `
attribute vec3 aPosition;
attribute vec4 aColor;

varying vec4 vColor;

void main() {
  vColor = aColor;
  gl_Position = vec4(aPosition, 1.0);
}
`;

export const FRAGMENT_SHADER = `
precision mediump float;

uniform float uTime;

varying vec4 vColor;

void main() {
  float pulse = 0.9 + 0.1 * sin(uTime * 0.001);
  gl_FragColor = vec4(vColor.rgb * pulse, vColor.a);
}
`;
