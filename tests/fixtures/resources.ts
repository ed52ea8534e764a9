import { Attr, HasMany, HasManyThrough, HasOne, Resource } from "@/core/resources/Decorators";
import { ResourceGraphBuilder, type ResourceGraph } from "@/core/resources/ResourceGraph";

@Resource("people")
export class Person {
    id: string = "";

    @Attr()
    name: string = "";

    @HasOne(() => Article, { inverse: "owner" })
    ownedArticle: Article | null = null;

    @HasMany(() => Article, { inverse: "author" })
    articles: Article[] = [];

    @HasOne(() => Person, { inverse: "mentee" })
    mentor: Person | null = null;

    @HasOne(() => Person)
    mentee: Person | null = null;
}

@Resource()
export class Article {
    id: string = "";

    @Attr()
    title: string = "";

    @HasOne(() => Person)
    owner: Person | null = null;

    @HasOne(() => Person)
    author: Person | null = null;

    /** No inverse on Person */
    @HasOne(() => Person)
    reviewer: Person | null = null;

    @HasManyThrough(() => Tag, {
        through: "articleTags",
        throughType: () => ArticleTag,
        leftProperty: "article",
        rightProperty: "tag"
    })
    tags: Tag[] = [];

    articleTags: ArticleTag[] = [];
}

@Resource()
export class Tag {
    id: string = "";

    @Attr()
    name: string = "";
}

export class ArticleTag {
    article: Article | null = null;
    tag: Tag | null = null;
}

export function createResourceGraph(): ResourceGraph {
    return new ResourceGraphBuilder()
        .add(Person)
        .add(Article)
        .add(Tag)
        .build();
}

export function person(id: string, name: string = `person-${id}`): Person {
    return Object.assign(new Person(), { id, name });
}

export function article(id: string, title: string = `article-${id}`): Article {
    return Object.assign(new Article(), { id, title });
}

export function tag(id: string, name: string = `tag-${id}`): Tag {
    return Object.assign(new Tag(), { id, name });
}

/**
 * Sets `article.tags` the way the store does, through join entities
 */
export function assignTags(target: Article, tags: Tag[]): Article {
    target.tags = tags;
    target.articleTags = tags.map(related => Object.assign(new ArticleTag(), { article: target, tag: related }));
    return target;
}
