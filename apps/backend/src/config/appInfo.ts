export const APP_NAME = 'Cloud Upload Gateway';
export const APP_VERSION = '1.0.0';
