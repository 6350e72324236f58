/**
 * Wire-level constants for the RoomMesh format.
 */

export const FormatConstants = {
  /** Header tag for documents without a trigger-box section */
  SIMPLE_TAG: 'RoomMesh',

  /** Header tag for documents carrying a trigger-box section */
  TRIGGER_BOX_TAG: 'RoomMesh.HasTriggerBox',

  /** Texture blend types in wire order; the index is the stored u8 */
  BLEND_TYPES: ['None', 'Visible', 'Lightmap', 'Transparent'] as const,

  /**
   * Entity magics. None of them is a prefix of another, so matching the
   * upcoming bytes against each in turn is unambiguous.
   */
  ENTITY_TYPES: ['screen', 'waypoint', 'light', 'spotlight', 'soundemitter', 'playerstart', 'model'] as const,

  /**
   * Header tag for a format variant
   */
  tagFor(variant: FormatVariant): string {
    return variant === 'HasTriggerBox' ? this.TRIGGER_BOX_TAG : this.SIMPLE_TAG
  },

  /**
   * Format variant for a header tag, or undefined for an unrecognized tag
   */
  variantFor(tag: string): FormatVariant | undefined {
    if (tag === this.SIMPLE_TAG) return 'Simple'
    if (tag === this.TRIGGER_BOX_TAG) return 'HasTriggerBox'
    return undefined
  }
}

export type FormatVariant = 'Simple' | 'HasTriggerBox'

export type BlendType = (typeof FormatConstants.BLEND_TYPES)[number]

export type EntityType = (typeof FormatConstants.ENTITY_TYPES)[number]
