import { EncodedImage } from './image-source.port';

export interface VisionModelPort {
  /**
   * Ask the vision model to read a card image.
   * @returns the model's reply text, or null when no usable reply was obtained
   */
  extractText(image: EncodedImage): Promise<string | null>;

  /** True when credentials for the model are configured */
  isConfigured(): boolean;
}
