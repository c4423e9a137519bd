import {
  FOREGROUND_RATIO_MAX,
  FOREGROUND_RATIO_MIN,
  GENERATION_CREDIT_COST,
  RATE_LIMIT_REQUESTS,
  RATE_LIMIT_WINDOW_SECONDS,
  VERTEX_COUNT_MAX,
} from './types.js';

export const API_INFO_URI = 'info://stable-fast-3d';

export const API_INFO_MARKDOWN = `# Stable Fast 3D API Information

## Overview
Stable Fast 3D generates a 3D asset from a single 2D input image.
The output is a GLB file (glTF binary format) that includes:
- 3D mesh geometry
- Albedo (color) texture map
- Normal texture map

## Cost
- **${GENERATION_CREDIT_COST} credits** per successful generation
- Failed generations are not charged

## Rate limit
- ${RATE_LIMIT_REQUESTS} requests every ${RATE_LIMIT_WINDOW_SECONDS} seconds; exceeding it returns a RateLimited error

## Input Image Requirements
- **Formats:** JPEG, PNG, or WebP
- **Dimensions:** Each side must be at least 64 pixels
- **Total pixels:** Between 4,096 and 4,194,304 pixels
- Use a clear, centered subject on a clean background

## Parameters

### texture_resolution
Resolution of the texture maps (albedo and normal).
- \`"512"\` - Lower detail, smaller file size
- \`"1024"\` - Default
- \`"2048"\` - Higher detail, larger file size

### foreground_ratio (${FOREGROUND_RATIO_MIN} - ${FOREGROUND_RATIO_MAX.toFixed(1)})
Controls padding around the object. Default: \`0.85\`.
Higher values mean less padding and a larger object. Lower values help with
long or narrow objects viewed from the narrow side.

### remesh
- \`"none"\` - Default, original mesh
- \`"triangle"\` - Triangular faces
- \`"quad"\` - Quadrilateral faces (useful for Maya or Blender)

### vertex_count (-1 to ${VERTEX_COUNT_MAX})
Target vertex count for mesh simplification. \`-1\` (default) means no limit.

## Output
A binary GLB file containing JSON metadata, geometry buffers and texture images.

See: https://registry.khronos.org/glTF/specs/2.0/glTF-2.0.html
`;
