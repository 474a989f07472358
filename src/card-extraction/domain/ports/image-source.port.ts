export interface EncodedImage {
  filename: string;
  mimeType: string;
  base64: string;
}

export interface ImageSourcePort {
  /**
   * List card images (.jpg, .jpeg, .png) in the configured directory, sorted
   * by filename. Creates the directory when it is missing.
   */
  listImages(): Promise<string[]>;

  /**
   * Read and encode one image
   * @throws Error when the file cannot be read
   */
  readImage(filePath: string): Promise<EncodedImage>;
}
