/**
 * Image Purpose & Style Presets
 * Fixed target formats and visual tones a session can select
 */

export const IMAGE_PURPOSES = [
  'sns_instagram_square',
  'sns_instagram_portrait',
  'sns_facebook',
  'banner_web',
  'banner_mobile',
  'product_showcase',
  'email_header',
  'custom',
] as const;

export type ImagePurpose = (typeof IMAGE_PURPOSES)[number];

export const STYLE_PRESETS = [
  'modern',
  'minimal',
  'vibrant',
  'luxury',
  'playful',
  'professional',
  'natural',
  'tech',
] as const;

export type StylePreset = (typeof STYLE_PRESETS)[number];

/** Aspect ratios the image backend accepts */
export type BackendAspectRatio = '1:1' | '9:16' | '16:9';

export interface IPurposePreset {
  id: ImagePurpose;
  name: string;
  ratio: string;
  width?: number;
  height?: number;
  description: string;
  backendAspectRatio: BackendAspectRatio;
  /** Composition hint prepended to generation prompts */
  hint: string;
}

export const DEFAULT_PURPOSE: ImagePurpose = 'sns_instagram_square';

export const PURPOSE_PRESETS: Record<ImagePurpose, IPurposePreset> = {
  sns_instagram_square: {
    id: 'sns_instagram_square',
    name: 'Instagram Square',
    ratio: '1:1',
    width: 1080,
    height: 1080,
    description: 'Square image for the Instagram feed',
    backendAspectRatio: '1:1',
    hint: 'eye-catching social media post, vibrant colors, engaging composition',
  },
  sns_instagram_portrait: {
    id: 'sns_instagram_portrait',
    name: 'Instagram Portrait',
    ratio: '4:5',
    width: 1080,
    height: 1350,
    description: 'Portrait image for the Instagram feed',
    // closest ratio the backend supports
    backendAspectRatio: '9:16',
    hint: 'vertical composition, mobile-optimized, scroll-stopping visual',
  },
  sns_facebook: {
    id: 'sns_facebook',
    name: 'Facebook Post',
    ratio: '1.91:1',
    width: 1200,
    height: 630,
    description: 'Image for Facebook shares and ads',
    backendAspectRatio: '16:9',
    hint: 'shareable content, clear message, professional look',
  },
  banner_web: {
    id: 'banner_web',
    name: 'Web Banner',
    ratio: '3:1',
    width: 1920,
    height: 640,
    description: 'Main banner for a website',
    backendAspectRatio: '16:9',
    hint: 'wide banner format, clean layout, brand-focused, text space on sides',
  },
  banner_mobile: {
    id: 'banner_mobile',
    name: 'Mobile Banner',
    ratio: '2:1',
    width: 800,
    height: 400,
    description: 'Banner for mobile web and apps',
    backendAspectRatio: '16:9',
    hint: 'mobile-friendly, simple composition, high contrast',
  },
  product_showcase: {
    id: 'product_showcase',
    name: 'Product Showcase',
    ratio: '1:1',
    width: 1000,
    height: 1000,
    description: 'Image for a product detail page',
    backendAspectRatio: '1:1',
    hint: 'product-focused, clean background, professional lighting',
  },
  email_header: {
    id: 'email_header',
    name: 'Email Header',
    ratio: '3:1',
    width: 600,
    height: 200,
    description: 'Header image for email campaigns',
    backendAspectRatio: '16:9',
    hint: 'simple, brand-aligned, minimal text space',
  },
  custom: {
    id: 'custom',
    name: 'Custom',
    ratio: 'custom',
    description: 'Size chosen by the user',
    backendAspectRatio: '1:1',
    hint: '',
  },
};

export const STYLE_HINTS: Record<StylePreset, string> = {
  modern: 'modern aesthetic, clean lines, contemporary design',
  minimal: 'minimalist style, white space, simple elements',
  vibrant: 'vibrant colors, energetic mood, bold visual',
  luxury: 'luxury feel, premium quality, sophisticated elegance',
  playful: 'playful, fun, colorful, friendly vibe',
  professional: 'professional, corporate, trustworthy appearance',
  natural: 'natural tones, organic feel, earthy colors',
  tech: 'tech-focused, futuristic, digital aesthetic',
};

export function isImagePurpose(value: unknown): value is ImagePurpose {
  return typeof value === 'string' && IMAGE_PURPOSES.some(candidate => candidate === value);
}

export function isStylePreset(value: unknown): value is StylePreset {
  return typeof value === 'string' && STYLE_PRESETS.some(candidate => candidate === value);
}

export function listPurposePresets(): IPurposePreset[] {
  return IMAGE_PURPOSES.map(purpose => PURPOSE_PRESETS[purpose]);
}
