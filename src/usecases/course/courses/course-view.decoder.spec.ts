// src/usecases/course/courses/course-view.decoder.spec.ts
import { decodeCourseView, decodeCourseViews } from './course-view.decoder';

const view = {
  id: 3,
  title: 'Intro to Testing',
  description: '',
  price: '19.90',
  is_published: true,
  owner: 'instructor1',
  owner_id: 2,
  created_at: '2026-01-02T03:04:05.000Z',
  lessons_count: 4,
};

describe('decodeCourseView', () => {
  it('还原合法的缓存载荷', () => {
    expect(decodeCourseView(JSON.parse(JSON.stringify(view)))).toEqual(view);
  });

  it('owner 允许为 null', () => {
    expect(decodeCourseView({ ...view, owner: null })).toEqual({ ...view, owner: null });
  });

  it('字段缺失或类型不符返回 null', () => {
    expect(decodeCourseView({ ...view, price: 19.9 })).toBeNull();
    expect(decodeCourseView({ id: 1 })).toBeNull();
    expect(decodeCourseView('course')).toBeNull();
    expect(decodeCourseView([view])).toBeNull();
  });
});

describe('decodeCourseViews', () => {
  it('全部元素合法时返回数组', () => {
    expect(decodeCourseViews([view, { ...view, id: 4 }])).toHaveLength(2);
    expect(decodeCourseViews([])).toEqual([]);
  });

  it('任一元素不合法时整体返回 null', () => {
    expect(decodeCourseViews([view, { ...view, title: 7 }])).toBeNull();
    expect(decodeCourseViews(view)).toBeNull();
  });
});
