/**
 * Enums for badge display settings.
 */

/**
 * How the uploaded bitmap moves across the display.
 *
 * STATIC, LEFT and RIGHT are confirmed from captured traces; the others are
 * accepted by the firmware but unverified.
 */
export enum ScrollMode {
  STATIC = 1,
  LEFT = 3,
  RIGHT = 4,
  UP = 5,
  DOWN = 6,
  SNOW = 7,
}

/**
 * Built-in animations stored in the badge firmware.
 */
export enum Animation {
  ANIM_1 = 1,
  ANIM_2 = 2,
  ANIM_3 = 3,
  ANIM_4 = 4,
  ANIM_5 = 5,
  ANIM_6 = 6,
  ANIM_7 = 7,
  ANIM_8 = 8,
}
