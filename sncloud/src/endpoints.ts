export const ENDPOINTS = {
  csrf: '/csrf',
  randomCode: '/official/user/query/random/code',
  login: '/official/user/account/login/new',
  list: '/file/list/query',
  downloadUrl: '/file/download/url',
  noteToPdf: '/file/note/to/pdf',
  noteToPng: '/file/note/to/png',
  createFolder: '/file/folder/add',
  uploadApply: '/file/upload/apply',
  uploadFinish: '/file/upload/finish',
  delete: '/file/delete',
} as const;
