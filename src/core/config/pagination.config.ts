// src/core/config/pagination.config.ts
// 分页相关配置

const paginationConfig = () => ({
  pagination: {
    defaultPageSize: parseInt(process.env.PAGINATION_DEFAULT_PAGE_SIZE || '20', 10),
    maxPageSize: parseInt(process.env.PAGINATION_MAX_PAGE_SIZE || '100', 10),
  },
});

export default paginationConfig;
