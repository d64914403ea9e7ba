// src/core/config/storage.config.ts

const storageConfig = () => ({
  storage: {
    mediaRoot: process.env.MEDIA_ROOT || './media',
    mediaUrl: process.env.MEDIA_URL || '/media',
  },
});

export default storageConfig;
