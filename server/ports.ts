import type { Coordinates, ResolvedAddress } from "@shared/conversation";
import type { RouteGeometry } from "@shared/routeGeometry";

// Capability interfaces for the collaborators the tracking engine depends on.
// Implementations throw AppError (COLLABORATOR_*) when the collaborator fails.

export interface EmbeddingProvider {
  embedImage(bytes: Uint8Array): Promise<number[]>;
  // Same vector space as embedImage
  embedText(text: string): Promise<number[]>;
}

export interface CropResult {
  croppedBytes: Uint8Array;
  thumbnailBytes: Uint8Array;
  // false when no foreground subject was isolated; callers use the original image
  found: boolean;
}

export interface SubjectCropper {
  cropSubject(bytes: Uint8Array): Promise<CropResult>;
}

export interface Geocoder {
  // null when the postal code is unknown to the geocoder
  forward(postalCode: string): Promise<Coordinates | null>;
  reverse(coordinates: Coordinates): Promise<ResolvedAddress | null>;
}

export interface RouteRenderer {
  render(geometry: RouteGeometry): Promise<Uint8Array>;
}
